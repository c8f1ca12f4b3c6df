import path from "node:path";
import { changedLogicalIds, htmlPathForId, injectPreviewMetadata, isSourceFile, logicalIdFromPath } from "./changed";
import { createPriorVersionSource } from "./config";
import type { PreviewConfig } from "./config";
import { addHomeBanner, chapterTitle } from "./notice";
import type { ChapterLink } from "./notice";
import { previewPage } from "./preview";
import type { PriorVersionSource } from "./prior";
import { fileExists, listHtmlFiles, readText, writeText } from "./storage";
import { similarityByName } from "./text";
import { annotateToc } from "./toc";
import type { ClassificationCounts, HighlightNote } from "./types";

export type PreviewLogger = {
  info(line: string): void;
  error(line: string): void;
};

export const consoleLogger: PreviewLogger = {
  info: (line) => console.log(line),
  error: (line) => console.error(line)
};

export type PageOutcome = {
  id: string;
  path: string;
  status: "annotated" | "unchanged" | "missing" | "failed";
  counts?: ClassificationCounts;
  similarity?: number | null;
  notes?: HighlightNote[];
  error?: string;
};

export type PreviewReport = {
  pages: PageOutcome[];
  tocUpdated: string[];
  homeBanner: boolean;
  failed: number;
};

export type PreviewDeps = {
  prior?: PriorVersionSource;
  logger?: PreviewLogger;
};

function formatPct(x: number): string {
  return `${(x * 100).toFixed(2)}%`;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export async function runPreview(config: PreviewConfig, deps: PreviewDeps = {}): Promise<PreviewReport> {
  const log = deps.logger ?? consoleLogger;
  const prior = deps.prior ?? createPriorVersionSource(config.prior);
  const ids = changedLogicalIds(config.changedFiles);
  const report: PreviewReport = { pages: [], tocUpdated: [], homeBanner: false, failed: 0 };

  if (!ids.length) {
    log.info("No changed files to process");
    return report;
  }

  log.info(`Comparing against ${prior.description}`);
  const options = { thresholds: config.thresholds, similarity: similarityByName(config.similarity) };

  for (const id of ids) {
    const rel = htmlPathForId(id);
    const filePath = path.join(config.htmlDir, rel);
    if (!(await fileExists(filePath))) {
      log.info(`Skipping ${rel}: no rendered page`);
      report.pages.push({ id, path: rel, status: "missing" });
      continue;
    }

    log.info(`Processing ${rel}...`);
    try {
      const newHtml = await readText(filePath);
      let oldHtml: string | null = null;
      try {
        oldHtml = await prior.read(rel);
      } catch (e) {
        log.error(`  Could not read prior version of ${rel}: ${errorMessage(e)}`);
      }
      if (oldHtml === null) log.info("  No prior version (page may be new); marking all content as added");

      const page = previewPage(newHtml, oldHtml, options);
      const similarity = page.summary?.similarity ?? null;
      if (similarity !== null) log.info(`  Similarity to published version: ${formatPct(similarity)}`);
      log.info(
        `  Highlighted ${page.counts.modified} modified and ${page.counts.added} added block(s); ${page.counts.unchanged} unchanged`
      );
      if (page.summary?.inserted) log.info("  Added content change notice");
      for (const note of page.notes) {
        if (note.kind === "malformed_element") log.error(`  Skipped irregular element ${note.blockId}`);
        if (note.kind === "element_failed") log.error(`  Could not highlight ${note.blockId}: ${note.message}`);
        if (note.kind === "anchor_missing") log.error("  No place to insert the change notice");
        if (note.kind === "extraction_miss") log.info(`  No main content container in ${note.side} page; using the whole page`);
      }

      if (page.changed) await writeText(filePath, page.html);
      report.pages.push({
        id,
        path: rel,
        status: page.changed ? "annotated" : "unchanged",
        counts: page.counts,
        similarity,
        notes: page.notes
      });
    } catch (e) {
      report.failed += 1;
      log.error(`  Failed to process ${rel}: ${errorMessage(e)}`);
      report.pages.push({ id, path: rel, status: "failed", error: errorMessage(e) });
    }
  }

  report.homeBanner = await addChangedChaptersBanner(config.htmlDir, ids, log);
  report.tocUpdated = await annotateSiteToc(config.htmlDir, ids, log);
  return report;
}

async function addChangedChaptersBanner(htmlDir: string, ids: string[], log: PreviewLogger): Promise<boolean> {
  const indexPath = path.join(htmlDir, "index.html");
  if (!(await fileExists(indexPath))) return false;
  try {
    const chapters: ChapterLink[] = [];
    for (const id of ids) {
      if (id === "index") continue;
      const chapterPath = path.join(htmlDir, htmlPathForId(id));
      if (!(await fileExists(chapterPath))) continue;
      try {
        chapters.push({ id, title: chapterTitle(await readText(chapterPath), id) });
      } catch (e) {
        log.error(`Could not read the title of ${htmlPathForId(id)}: ${errorMessage(e)}`);
      }
    }
    if (!chapters.length) return false;
    const html = await readText(indexPath);
    const next = addHomeBanner(html, chapters);
    if (next === html) return false;
    await writeText(indexPath, next);
    log.info(`Added home page banner with ${chapters.length} changed chapter(s)`);
    return true;
  } catch (e) {
    log.error(`Could not add home page banner: ${errorMessage(e)}`);
    return false;
  }
}

async function annotateSiteToc(htmlDir: string, ids: string[], log: PreviewLogger): Promise<string[]> {
  const updated: string[] = [];
  for (const rel of await listHtmlFiles(htmlDir)) {
    const filePath = path.join(htmlDir, rel);
    try {
      const html = await readText(filePath);
      const next = annotateToc(html, ids, { documentId: logicalIdFromPath(rel) });
      if (next === html) continue;
      await writeText(filePath, next);
      updated.push(rel);
    } catch (e) {
      log.error(`Could not annotate navigation in ${rel}: ${errorMessage(e)}`);
    }
  }
  if (updated.length) log.info(`Marked changed chapters in the navigation of ${updated.length} page(s)`);
  return updated;
}

export async function runInjectMetadata(
  files: string[],
  logger: PreviewLogger = consoleLogger,
  cwd: string = process.cwd()
): Promise<{ updated: string[]; missing: string[] }> {
  const updated: string[] = [];
  const missing: string[] = [];
  if (!files.length) {
    logger.info("No changed files to process");
    return { updated, missing };
  }
  for (const file of files) {
    if (!isSourceFile(file)) continue;
    const filePath = path.resolve(cwd, file);
    if (!(await fileExists(filePath))) {
      logger.error(`Warning: File not found: ${file}`);
      missing.push(file);
      continue;
    }
    const source = await readText(filePath);
    const next = injectPreviewMetadata(source);
    if (next !== source) {
      await writeText(filePath, next);
      updated.push(file);
      logger.info(`Injected preview metadata into ${file}`);
    }
  }
  return { updated, missing };
}
