import type { Edit } from "./types";

/**
 * Applies offset edits right to left so that earlier offsets stay valid.
 * Edits outside the source, or overlapping an edit that starts earlier, are ignored.
 * Insertions at the same offset keep their given order.
 */
export function applyEdits(source: string, edits: Edit[]): string {
  const ordered = edits
    .map((edit, order) => ({ edit, order }))
    .filter(({ edit }) => edit.start >= 0 && edit.end <= source.length && edit.start <= edit.end)
    .sort((a, b) => a.edit.start - b.edit.start || a.edit.end - b.edit.end || a.order - b.order);

  const kept: Edit[] = [];
  let lastEnd = -1;
  for (const { edit } of ordered) {
    if (edit.start < lastEnd) continue;
    kept.push(edit);
    lastEnd = edit.end;
  }

  let out = source;
  for (let i = kept.length - 1; i >= 0; i--) {
    const e = kept[i];
    out = out.slice(0, e.start) + e.replacement + out.slice(e.end);
  }
  return out;
}

export function openTagLength(html: string, start: number): number {
  const m = /^<[^>]*>/.exec(html.slice(start));
  return m ? m[0].length : 0;
}
