export { extractBlocks, extractMainRegion, extractPage, textSegments, withoutPreviewBoilerplate } from "./blocks";
export type { ExtractedPage } from "./blocks";
export { changedLogicalIds, injectPreviewMetadata, logicalIdFromPath, parseChangedFiles } from "./changed";
export { loadConfig } from "./config";
export type { PreviewConfig, PriorSourceConfig } from "./config";
export { applyEdits } from "./edits";
export { highlightDocument, renderBlock } from "./highlight";
export type { HighlightResult, RenderedBlock } from "./highlight";
export { diffTokens, distributeParts, inlineDiffHtml } from "./inlineDiff";
export type { InlinePart } from "./inlineDiff";
export { classifyMatch, createGreedyMatcher, matchBlocks } from "./match";
export { addHomeBanner, chapterTitle, documentSimilarity, maybeInsertSummary } from "./notice";
export type { SummaryResult } from "./notice";
export { runInjectMetadata, runPreview } from "./pipeline";
export type { PageOutcome, PreviewLogger, PreviewReport } from "./pipeline";
export { previewPage } from "./preview";
export type { PagePreview } from "./preview";
export { DirectoryPriorVersionSource, GitPriorVersionSource, NoPriorVersionSource } from "./prior";
export type { PriorVersionSource } from "./prior";
export { MARKER_CLASS } from "./render";
export { diceCoefficient, normalizeMarkup, sequenceRatio, similarityTokens } from "./text";
export type { SimilarityFn } from "./text";
export { annotateToc, hrefToLogicalId } from "./toc";
export * from "./types";
