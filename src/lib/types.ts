import type { SimilarityFn } from "./text";

export type BlockKind = "heading" | "paragraph" | "list_item" | "blockquote";

export type TextSegment = {
  /** Offsets in the full document string. */
  start: number;
  end: number;
  text: string;
};

export type Block = {
  blockId: string;
  kind: BlockKind;
  tag: string;
  position: number;
  /** Offsets of `rawMarkup` in the full document string. */
  start: number;
  end: number;
  rawMarkup: string;
  /** Segment texts joined by single spaces. */
  text: string;
  segments: TextSegment[];
  meta: {
    headingLevel?: number;
  };
};

export type MainRegion = {
  fragment: string;
  start: number;
  end: number;
  /** Offset right after the container's open tag, when a container was found. */
  openTagEnd: number | null;
  found: boolean;
};

export type BlockMatch = {
  newIndex: number;
  oldIndex: number | null;
  similarity: number;
};

export type Classification = "unchanged" | "modified" | "added";

export type Thresholds = {
  /** Best scores at or below this pair the new block with nothing. */
  minSimilarity: number;
  /** Scores at or above this count as unchanged. */
  unchangedSimilarity: number;
  /** Whole-page scores above this skip the summary notice. */
  noticeSimilarity: number;
};

export const DEFAULT_THRESHOLDS: Thresholds = {
  minSimilarity: 0.5,
  unchangedSimilarity: 0.99,
  noticeSimilarity: 0.95
};

export interface MatchStrategy {
  readonly name: string;
  match(oldBlocks: Block[], newBlocks: Block[]): BlockMatch[];
}

export type HighlightOptions = {
  thresholds?: Partial<Thresholds>;
  similarity?: SimilarityFn;
  matcher?: MatchStrategy;
};

export type HighlightNote =
  | { kind: "missing_prior_version" }
  | { kind: "extraction_miss"; side: "old" | "new" }
  | { kind: "malformed_element"; blockId: string; position: number }
  | { kind: "element_failed"; blockId: string; position: number; message: string }
  | { kind: "anchor_missing" };

export type ClassificationCounts = Record<Classification, number>;

export type Edit = {
  start: number;
  end: number;
  replacement: string;
};
