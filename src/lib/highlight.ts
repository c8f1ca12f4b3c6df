import { extractPage } from "./blocks";
import { applyEdits } from "./edits";
import { diffTokens, distributeParts, renderInlineParts, splitEdgeWhitespace } from "./inlineDiff";
import { classifyMatch, createGreedyMatcher } from "./match";
import { addedSpan } from "./render";
import { sequenceRatio } from "./text";
import type {
  Block,
  BlockMatch,
  Classification,
  ClassificationCounts,
  Edit,
  HighlightNote,
  HighlightOptions,
  MainRegion,
  Thresholds
} from "./types";
import { DEFAULT_THRESHOLDS } from "./types";

export type RenderedBlock = {
  markup: string;
  /** True when the element could not be split into open tag, content and close tag. */
  malformed: boolean;
};

export type HighlightResult = {
  html: string;
  blocks: Block[];
  matches: BlockMatch[];
  classifications: Classification[];
  counts: ClassificationCounts;
  region: MainRegion;
  oldRegion: MainRegion | null;
  notes: HighlightNote[];
};

export function resolveThresholds(partial?: Partial<Thresholds>): Thresholds {
  return { ...DEFAULT_THRESHOLDS, ...(partial ?? {}) };
}

export function splitElement(rawMarkup: string, tag: string): { open: string; inner: string; close: string } | null {
  const re = new RegExp(`^(<${tag}\\b[^>]*>)([\\s\\S]*?)(<\\/${tag}\\s*>)$`, "i");
  const m = re.exec(rawMarkup);
  if (!m) return null;
  return { open: m[1], inner: m[2], close: m[3] };
}

/**
 * Rewrites each text segment of a changed block and leaves its nested
 * structure alone. Added segments keep their inline markup inside the added
 * span; modified segments are re-rendered from text, and segments without
 * changes stay as they are.
 */
export function renderBlock(block: Block, oldText: string | null, classification: Classification): RenderedBlock {
  if (classification === "unchanged") return { markup: block.rawMarkup, malformed: false };
  if (!splitElement(block.rawMarkup, block.tag)) return { markup: block.rawMarkup, malformed: true };

  const perSegment =
    classification === "modified"
      ? distributeParts(diffTokens(oldText ?? "", block.text), block.segments.map((s) => s.text.length))
      : null;

  const edits: Edit[] = [];
  block.segments.forEach((segment, i) => {
    const start = segment.start - block.start;
    const end = segment.end - block.start;
    const { lead, core, trail } = splitEdgeWhitespace(block.rawMarkup.slice(start, end));
    if (!perSegment) {
      edits.push({ start, end, replacement: `${lead}${addedSpan(core)}${trail}` });
      return;
    }
    const parts = perSegment[i] ?? [];
    if (parts.every((p) => p.type === "equal")) return;
    edits.push({ start, end, replacement: `${lead}${renderInlineParts(parts)}${trail}` });
  });
  return { markup: applyEdits(block.rawMarkup, edits), malformed: false };
}

function oldBlockFor(match: BlockMatch, oldBlocks: Block[]): Block | undefined {
  if (match.oldIndex === null) return undefined;
  const block = oldBlocks[match.oldIndex];
  if (!block) throw new Error(`No old block at index ${match.oldIndex}`);
  return block;
}

/**
 * Annotates `newHtml` against `oldHtml`. A null `oldHtml` means there is no
 * prior version, and every block is rendered as added.
 */
export function highlightDocument(newHtml: string, oldHtml: string | null, options: HighlightOptions = {}): HighlightResult {
  const thresholds = resolveThresholds(options.thresholds);
  const matcher =
    options.matcher ??
    createGreedyMatcher({ minSimilarity: thresholds.minSimilarity, similarity: options.similarity ?? sequenceRatio });

  const notes: HighlightNote[] = [];
  const newPage = extractPage(newHtml);
  if (!newPage.region.found) notes.push({ kind: "extraction_miss", side: "new" });

  let oldBlocks: Block[] = [];
  let oldRegion: MainRegion | null = null;
  if (oldHtml === null) {
    notes.push({ kind: "missing_prior_version" });
  } else {
    const oldPage = extractPage(oldHtml);
    oldBlocks = oldPage.blocks;
    oldRegion = oldPage.region;
    if (!oldPage.region.found) notes.push({ kind: "extraction_miss", side: "old" });
  }

  const blocks = newPage.blocks;
  const matches = matcher.match(oldBlocks, blocks);
  const byNew = new Map(matches.map((m) => [m.newIndex, m]));

  const counts: ClassificationCounts = { unchanged: 0, modified: 0, added: 0 };
  const classifications: Classification[] = [];
  const edits: Edit[] = [];

  for (const block of blocks) {
    const match = byNew.get(block.position) ?? { newIndex: block.position, oldIndex: null, similarity: 0 };
    let classification: Classification = "unchanged";
    try {
      const oldBlock = oldBlockFor(match, oldBlocks);
      classification = classifyMatch(match, oldBlock, block, thresholds);
      const rendered = renderBlock(block, oldBlock?.text ?? null, classification);
      if (rendered.malformed) {
        notes.push({ kind: "malformed_element", blockId: block.blockId, position: block.position });
      } else if (rendered.markup !== block.rawMarkup) {
        edits.push({ start: block.start, end: block.end, replacement: rendered.markup });
      }
    } catch (e) {
      notes.push({
        kind: "element_failed",
        blockId: block.blockId,
        position: block.position,
        message: e instanceof Error ? e.message : String(e)
      });
    }
    classifications.push(classification);
    counts[classification] += 1;
  }

  return {
    html: applyEdits(newHtml, edits),
    blocks,
    matches: blocks.map((b) => byNew.get(b.position) ?? { newIndex: b.position, oldIndex: null, similarity: 0 }),
    classifications,
    counts,
    region: newPage.region,
    oldRegion,
    notes
  };
}
