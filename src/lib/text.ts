import DiffMatchPatch from "diff-match-patch";

const dmp = new DiffMatchPatch();
// No deadline: a similarity score depends on its inputs only.
dmp.Diff_Timeout = 0;

export type SimilarityFn = (a: string, b: string) => number;

export type SimilarityName = "sequence" | "dice";

/**
 * Drops comments and collapses whitespace so that two renderings of the same
 * content compare equal regardless of formatting drift. Only used for the
 * whole-page ratio; never applied to markup that is written back.
 */
export function normalizeMarkup(markup: string): string {
  return markup
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Tags, whitespace runs and words; joining them gives back the input. */
export function similarityTokens(text: string): string[] {
  return text.match(/<[^>]*>|\s+|[^\s<]+|</g) ?? [];
}

/**
 * Ratio of matched characters, `2 * M / (|a| + |b|)`, where M counts the
 * characters of the tokens a token-level diff keeps equal. Tokens are mapped
 * to single code units (diff-match-patch's line mode applied to words) and
 * diffed without a deadline, so the score depends on the input alone. The
 * inputs are put in a fixed order first, so `ratio(a, b) === ratio(b, a)`.
 */
export function sequenceRatio(a: string, b: string): number {
  if (a === b) return 1;
  if (!a || !b) return 0;
  const [first, second] = a < b ? [a, b] : [b, a];
  const { chars1, chars2, lengths } = tokensToChars(similarityTokens(first), similarityTokens(second));
  const diffs = dmp.diff_main(chars1, chars2, false);
  let equal = 0;
  for (const [op, data] of diffs) {
    if (op !== DiffMatchPatch.DIFF_EQUAL) continue;
    for (let i = 0; i < data.length; i++) equal += lengths[data.charCodeAt(i)] ?? 0;
  }
  return Math.min(1, (2 * equal) / (a.length + b.length));
}

const MAX_TOKEN_CODES = 0xffff;

/**
 * Encodes each distinct token as one code unit. Past the last code, further
 * distinct tokens share it and count as unmatched.
 */
function tokensToChars(
  tokens1: string[],
  tokens2: string[]
): { chars1: string; chars2: string; lengths: number[] } {
  const codes = new Map<string, number>();
  const lengths: number[] = [];
  const encode = (tokens: string[]): string => {
    let out = "";
    for (const token of tokens) {
      let code = codes.get(token);
      if (code === undefined) {
        code = Math.min(codes.size, MAX_TOKEN_CODES);
        if (code < MAX_TOKEN_CODES) {
          codes.set(token, code);
          lengths[code] = token.length;
        } else {
          lengths[code] = 0;
        }
      }
      out += String.fromCharCode(code);
    }
    return out;
  };
  const chars1 = encode(tokens1);
  const chars2 = encode(tokens2);
  return { chars1, chars2, lengths };
}

/** Bigram overlap of the raw texts; only identical texts score 1. */
export function diceCoefficient(a: string, b: string): number {
  if (a === b) return 1;
  if (!a || !b) return 0;
  const bgA = bigrams(a);
  const bgB = bigrams(b);
  let overlap = 0;
  const map = new Map<string, number>();
  for (const x of bgA) map.set(x, (map.get(x) ?? 0) + 1);
  for (const y of bgB) {
    const c = map.get(y) ?? 0;
    if (c > 0) {
      overlap += 1;
      map.set(y, c - 1);
    }
  }
  return Math.min(0.999, (2 * overlap) / (bgA.length + bgB.length));
}

function bigrams(s: string): string[] {
  const out: string[] = [];
  for (let i = 0; i < s.length - 1; i++) out.push(s.slice(i, i + 2));
  return out.length ? out : [s];
}

export function similarityByName(name: SimilarityName): SimilarityFn {
  return name === "dice" ? diceCoefficient : sequenceRatio;
}
