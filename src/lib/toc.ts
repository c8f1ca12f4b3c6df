import path from "node:path";
import { loadWithOffsets } from "./blocks";
import { logicalIdFromPath } from "./changed";
import { applyEdits, openTagLength } from "./edits";
import { MARKER_CLASS } from "./render";
import type { Edit } from "./types";

export const NAV_LINK_SELECTOR = "nav a[href], a.sidebar-link[href], a.sidebar-item-text[href]";

export type TocOptions = {
  /** Logical id of the page being annotated; relative links resolve against it. */
  documentId?: string;
  className?: string;
  selector?: string;
};

/**
 * Logical id a link points at, or null for external links, bare fragments and
 * paths that climb out of the site.
 */
export function hrefToLogicalId(href: string, documentId = "index"): string | null {
  const h = href.trim();
  if (!h || h.startsWith("#") || h.startsWith("//")) return null;
  if (/^[a-z][a-z0-9+.-]*:/i.test(h)) return null;
  const target = h.split(/[?#]/)[0] ?? "";
  if (!target) return null;

  const resolved = target.startsWith("/")
    ? path.posix.normalize(target.slice(1))
    : path.posix.normalize(path.posix.join(path.posix.dirname(documentId), target));
  if (resolved === ".." || resolved.startsWith("../")) return null;
  if (resolved === "." || resolved === "./") return "index";
  return logicalIdFromPath(resolved.endsWith("/") ? `${resolved}index` : resolved);
}

export function addClassToOpenTag(openTag: string, className: string): string {
  const attr = /\sclass\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/i.exec(openTag);
  if (!attr) return openTag.replace(/\/?>$/, (end) => ` class="${className}"${end}`);
  const value = attr[1] ?? attr[2] ?? attr[3] ?? "";
  const classes = value.split(/\s+/).filter(Boolean);
  if (classes.includes(className)) return openTag;
  const next = ` class="${[...classes, className].join(" ")}"`;
  return openTag.slice(0, attr.index) + next + openTag.slice(attr.index + attr[0].length);
}

/**
 * Adds the highlight class to every navigation link that targets a changed
 * document. Links that already carry the class are left alone.
 */
export function annotateToc(html: string, changedIds: Iterable<string>, options: TocOptions = {}): string {
  const ids = new Set(Array.from(changedIds, (id) => id.trim().replace(/^(?:\.\/)+/, "")));
  if (ids.size === 0) return html;
  const className = options.className ?? MARKER_CLASS.toc;
  const documentId = options.documentId ?? "index";

  const $ = loadWithOffsets(html);
  const edits: Edit[] = [];
  $(options.selector ?? NAV_LINK_SELECTOR).each((_, el) => {
    if (el.startIndex === null) return;
    const target = hrefToLogicalId($(el).attr("href") ?? "", documentId);
    if (!target || !ids.has(target)) return;
    if ($(el).hasClass(className)) return;
    const len = openTagLength(html, el.startIndex);
    if (!len) return;
    const openTag = html.slice(el.startIndex, el.startIndex + len);
    const next = addClassToOpenTag(openTag, className);
    if (next !== openTag) edits.push({ start: el.startIndex, end: el.startIndex + len, replacement: next });
  });
  return applyEdits(html, edits);
}
