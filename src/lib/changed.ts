import path from "node:path";

export const SOURCE_EXTENSIONS = [".qmd", ".md", ".rmd"];

/** Splits the changed-files list on newlines or commas; order kept, duplicates dropped. */
export function parseChangedFiles(raw: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const item of raw.split(/[\n,]/)) {
    const p = item.trim();
    if (!p || seen.has(p)) continue;
    seen.add(p);
    out.push(p);
  }
  return out;
}

/** `./chapters/01-intro.qmd` → `chapters/01-intro` */
export function logicalIdFromPath(p: string): string {
  const posix = p.trim().replace(/\\/g, "/").replace(/^(?:\.\/)+/, "").replace(/^\/+/, "");
  const ext = path.posix.extname(posix);
  return ext ? posix.slice(0, -ext.length) : posix;
}

export function isSourceFile(p: string): boolean {
  return SOURCE_EXTENSIONS.includes(path.posix.extname(p.trim()).toLowerCase());
}

export function changedLogicalIds(files: string[]): string[] {
  const ids: string[] = [];
  for (const f of files) {
    if (!isSourceFile(f)) continue;
    const id = logicalIdFromPath(f);
    if (id && !ids.includes(id)) ids.push(id);
  }
  return ids;
}

export function htmlPathForId(id: string): string {
  return `${id}.html`;
}

export const PREVIEW_METADATA_KEY = "preview-changed";

/**
 * Marks a source document as changed in its YAML front matter, creating the
 * front matter when there is none (or when the opening `---` is never closed).
 */
export function injectPreviewMetadata(source: string): string {
  const line = `${PREVIEW_METADATA_KEY}: true\n`;
  const m = /^---\n([\s\S]*?\n)?---(\n|$)/.exec(source);
  if (!m) return `---\n${line}---\n${source}`;
  const front = m[1] ?? "";
  if (new RegExp(`^${PREVIEW_METADATA_KEY}:`, "m").test(front)) return source;
  const rest = source.slice(m[0].length);
  return `---\n${front}${line}---${m[2]}${rest}`;
}
