import { highlightDocument, resolveThresholds } from "./highlight";
import type { HighlightResult } from "./highlight";
import { maybeInsertSummary } from "./notice";
import type { SummaryResult } from "./notice";
import { ensureStyles } from "./render";
import type { HighlightNote, HighlightOptions } from "./types";

export type PagePreview = HighlightResult & {
  summary: SummaryResult | null;
  changed: boolean;
};

/**
 * Block highlighting followed by the whole-page summary notice. The two
 * decisions are made independently: a page may be similar enough to skip the
 * notice while some of its blocks are still marked modified.
 */
export function previewPage(newHtml: string, oldHtml: string | null, options: HighlightOptions = {}): PagePreview {
  const result = highlightDocument(newHtml, oldHtml, options);
  const notes: HighlightNote[] = [...result.notes];
  let html = result.html;
  let summary: SummaryResult | null = null;

  if (result.oldRegion) {
    summary = maybeInsertSummary(html, result.oldRegion.fragment, result.region.fragment, {
      noticeSimilarity: resolveThresholds(options.thresholds).noticeSimilarity,
      similarity: options.similarity
    });
    html = summary.html;
    if (summary.reason === "anchor_missing") notes.push({ kind: "anchor_missing" });
  }

  if (html !== newHtml) html = ensureStyles(html);
  return { ...result, html, notes, summary, changed: html !== newHtml };
}
