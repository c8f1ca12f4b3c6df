import { sequenceRatio } from "./text";
import type { SimilarityFn } from "./text";
import type { Block, BlockMatch, Classification, MatchStrategy, Thresholds } from "./types";
import { DEFAULT_THRESHOLDS } from "./types";

/**
 * Walks the new blocks in document order and lets each one claim the best
 * unclaimed old block. Ties go to the earliest old block. Order dependent by
 * construction: an earlier new block may take a candidate a later one scores
 * slightly higher against.
 */
export function createGreedyMatcher(options?: { minSimilarity?: number; similarity?: SimilarityFn }): MatchStrategy {
  const minSimilarity = options?.minSimilarity ?? DEFAULT_THRESHOLDS.minSimilarity;
  const similarity = options?.similarity ?? sequenceRatio;

  return {
    name: "greedy",
    match(oldBlocks: Block[], newBlocks: Block[]): BlockMatch[] {
      const claimed = new Set<number>();
      return newBlocks.map((nb, newIndex) => {
        let bestIndex = -1;
        let bestScore = -1;
        for (let k = 0; k < oldBlocks.length; k++) {
          if (claimed.has(k)) continue;
          const ob = oldBlocks[k];
          const s = ob.text === nb.text ? 1 : similarity(ob.text, nb.text);
          if (s > bestScore) {
            bestIndex = k;
            bestScore = s;
          }
        }
        if (bestIndex < 0 || bestScore <= minSimilarity) {
          return { newIndex, oldIndex: null, similarity: Math.max(0, bestScore) };
        }
        claimed.add(bestIndex);
        return { newIndex, oldIndex: bestIndex, similarity: bestScore };
      });
    }
  };
}

export function matchBlocks(oldBlocks: Block[], newBlocks: Block[], strategy?: MatchStrategy): BlockMatch[] {
  return (strategy ?? createGreedyMatcher()).match(oldBlocks, newBlocks);
}

export function classifyMatch(
  match: BlockMatch,
  oldBlock: Block | undefined,
  newBlock: Block,
  thresholds: Pick<Thresholds, "unchangedSimilarity"> = DEFAULT_THRESHOLDS
): Classification {
  if (match.oldIndex === null || !oldBlock) return "added";
  if (oldBlock.text === newBlock.text) return "unchanged";
  if (match.similarity >= thresholds.unchangedSimilarity) return "unchanged";
  return "modified";
}
