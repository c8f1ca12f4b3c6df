import { elementSpan, extractMainRegion, loadWithOffsets, withoutPreviewBoilerplate } from "./blocks";
import { applyEdits } from "./edits";
import { MARKER_CLASS, renderChangeNotice, renderHomeBanner } from "./render";
import { collapseWhitespace, normalizeMarkup, sequenceRatio } from "./text";
import type { SimilarityFn } from "./text";
import { DEFAULT_THRESHOLDS } from "./types";

export type SummaryResult = {
  html: string;
  similarity: number;
  inserted: boolean;
  reason: "inserted" | "similar" | "already_present" | "anchor_missing";
};

/** Similarity of two content regions, ignoring the preview build's own banners and notices. */
export function documentSimilarity(oldFragment: string, newFragment: string, similarity: SimilarityFn = sequenceRatio): number {
  return similarity(
    normalizeMarkup(withoutPreviewBoilerplate(oldFragment)),
    normalizeMarkup(withoutPreviewBoilerplate(newFragment))
  );
}

export function changePercent(similarity: number): number {
  return Math.round((1 - similarity) * 100);
}

/**
 * Offset right after the page's "changed" banner, else right after the open
 * tag of the main content container, else null.
 */
export function findNoticeAnchor(html: string): number | null {
  const $ = loadWithOffsets(html);
  const banner = $(`div.${MARKER_CLASS.changedBanner}`).get(0);
  const bannerSpan = banner ? elementSpan(banner) : null;
  if (bannerSpan) return bannerSpan.end;
  return extractMainRegion(html, $).openTagEnd;
}

export function maybeInsertSummary(
  newDocument: string,
  oldFragment: string,
  newFragment: string,
  options?: { noticeSimilarity?: number; similarity?: SimilarityFn }
): SummaryResult {
  const threshold = options?.noticeSimilarity ?? DEFAULT_THRESHOLDS.noticeSimilarity;
  const similarity = documentSimilarity(oldFragment, newFragment, options?.similarity);
  if (similarity > threshold) return { html: newDocument, similarity, inserted: false, reason: "similar" };
  if (newDocument.includes(`class="${MARKER_CLASS.notice}"`)) {
    return { html: newDocument, similarity, inserted: false, reason: "already_present" };
  }
  const anchor = findNoticeAnchor(newDocument);
  if (anchor === null) return { html: newDocument, similarity, inserted: false, reason: "anchor_missing" };
  const html = applyEdits(newDocument, [{ start: anchor, end: anchor, replacement: renderChangeNotice(changePercent(similarity)) }]);
  return { html, similarity, inserted: true, reason: "inserted" };
}

export type ChapterLink = { id: string; title: string };

/** "3. Title" from a chapter heading with a number span, else the first `<h1>` text. */
export function chapterTitle(html: string, fallback: string): string {
  const $ = loadWithOffsets(html);
  const h1 = $("h1").first();
  if (!h1.length) return fallback;
  const num = collapseWhitespace(h1.find("span.chapter-number").first().text());
  const clone = h1.clone();
  clone.find("span.chapter-number").remove();
  const title = collapseWhitespace(clone.text());
  if (!title) return fallback;
  return num ? `${num}. ${title}` : title;
}

export function addHomeBanner(indexHtml: string, chapters: ChapterLink[]): string {
  if (!chapters.length) return indexHtml;
  if (indexHtml.includes(`class="${MARKER_CLASS.homeBanner}"`)) return indexHtml;
  const anchor = extractMainRegion(indexHtml).openTagEnd;
  if (anchor === null) return indexHtml;
  return applyEdits(indexHtml, [{ start: anchor, end: anchor, replacement: renderHomeBanner(chapters) }]);
}
