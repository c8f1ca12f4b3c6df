import { diffArrays } from "diff";
import { addedSpan, changedSpan } from "./render";
import { collapseWhitespace, escapeHtml } from "./text";

export type InlinePart =
  | { type: "equal"; value: string }
  | { type: "added"; value: string }
  | { type: "changed"; value: string; previous: string };

/** Word runs and whitespace runs, in order; joining them gives back the input. */
export function tokenize(text: string): string[] {
  return text.match(/\s+|\S+/g) ?? [];
}

/**
 * Aligns the two texts token by token. Removed runs that are not followed or
 * preceded by an added run are dropped: only the new text is ever rendered.
 */
export function diffTokens(beforeText: string, afterText: string): InlinePart[] {
  const parts = diffArrays(tokenize(beforeText), tokenize(afterText));
  const out: InlinePart[] = [];

  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    const value = part.value.join("");
    if (!part.added && !part.removed) {
      out.push({ type: "equal", value });
      continue;
    }
    const next = parts[i + 1];
    if (part.removed) {
      if (next?.added) {
        out.push({ type: "changed", value: next.value.join(""), previous: value });
        i++;
      }
      continue;
    }
    if (next?.removed) {
      out.push({ type: "changed", value, previous: next.value.join("") });
      i++;
      continue;
    }
    out.push({ type: "added", value });
  }

  return out;
}

export function renderInlineParts(parts: InlinePart[]): string {
  return parts
    .map((part) => {
      if (part.type === "equal") return escapeHtml(part.value);
      const { lead, core, trail } = splitEdgeWhitespace(part.value);
      if (!core) return escapeHtml(part.value);
      const previous = part.type === "changed" ? collapseWhitespace(part.previous) : "";
      const marked = previous ? changedSpan(escapeHtml(core), previous) : addedSpan(escapeHtml(core));
      return `${escapeHtml(lead)}${marked}${escapeHtml(trail)}`;
    })
    .join("");
}

/**
 * Cuts parts computed over segment texts joined by single spaces back into
 * one list per segment. The joining spaces are dropped.
 */
export function distributeParts(parts: InlinePart[], segmentLengths: number[]): InlinePart[][] {
  const out: InlinePart[][] = segmentLengths.map(() => []);
  let seg = 0;
  let pos = 0;
  for (const part of parts) {
    let value = part.value;
    while (value && seg < segmentLengths.length) {
      const room = segmentLengths[seg] - pos;
      if (room <= 0) {
        value = value.slice(1);
        seg += 1;
        pos = 0;
        continue;
      }
      const piece = value.slice(0, room);
      out[seg].push({ ...part, value: piece });
      pos += piece.length;
      value = value.slice(piece.length);
    }
  }
  return out;
}

export function inlineDiffHtml(beforeText: string, afterText: string): string {
  return renderInlineParts(diffTokens(beforeText, afterText));
}

export function splitEdgeWhitespace(value: string): { lead: string; core: string; trail: string } {
  const lead = /^\s*/.exec(value)?.[0] ?? "";
  const rest = value.slice(lead.length);
  const trail = /\s*$/.exec(rest)?.[0] ?? "";
  return { lead, core: rest.slice(0, rest.length - trail.length), trail };
}
