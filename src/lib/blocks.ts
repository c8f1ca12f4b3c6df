import * as cheerio from "cheerio";
import { isTag, isText } from "domhandler";
import type { AnyNode, ChildNode, Element } from "domhandler";
import { applyEdits } from "./edits";
import { MARKER_CLASS } from "./render";
import { collapseWhitespace } from "./text";
import type { Block, BlockKind, Edit, MainRegion, TextSegment } from "./types";

const BLOCK_TAGS = new Set(["p", "h1", "h2", "h3", "h4", "h5", "h6", "li", "blockquote"]);
const BLOCK_SELECTOR = Array.from(BLOCK_TAGS).join(",");

/** Elements whose boundaries separate words and split a block into segments. */
const BLOCK_LEVEL_TAGS = new Set([
  ...BLOCK_TAGS,
  "ul",
  "ol",
  "dl",
  "dt",
  "dd",
  "div",
  "section",
  "pre",
  "table",
  "thead",
  "tbody",
  "tfoot",
  "tr",
  "td",
  "th",
  "figure",
  "figcaption"
]);

/** Markup the preview build adds itself; never content. */
export const PREVIEW_BOILERPLATE_SELECTOR = [MARKER_CLASS.changedBanner, MARKER_CLASS.notice, MARKER_CLASS.homeBanner]
  .map((c) => `.${c}`)
  .join(", ");

export type ExtractedPage = {
  region: MainRegion;
  blocks: Block[];
};

/**
 * Parses with htmlparser2 so that every element keeps its start/end offsets in
 * the original string. Edits are applied by those offsets later on.
 */
export function loadWithOffsets(html: string): cheerio.CheerioAPI {
  return cheerio.load(html, {
    xml: { xmlMode: false, decodeEntities: true, withStartIndices: true, withEndIndices: true }
  });
}

export function elementSpan(el: Element): { start: number; end: number } | null {
  if (el.startIndex === null || el.endIndex === null) return null;
  return { start: el.startIndex, end: el.endIndex + 1 };
}

export function findMainContainer($: cheerio.CheerioAPI): Element | null {
  const main = $("main").get(0);
  if (main) return main;
  const content = $("div")
    .filter((_, el) => ($(el).attr("class") ?? "").includes("content"))
    .get(0);
  return content ?? null;
}

export function extractMainRegion(html: string, $: cheerio.CheerioAPI = loadWithOffsets(html)): MainRegion {
  const whole: MainRegion = { fragment: html, start: 0, end: html.length, openTagEnd: null, found: false };
  const container = findMainContainer($);
  if (!container) return whole;
  const span = elementSpan(container);
  if (!span) return whole;

  const raw = html.slice(span.start, span.end);
  const open = /^<[^>]*>/.exec(raw);
  const innerStart = span.start + (open ? open[0].length : 0);
  const close = new RegExp(`</${container.tagName}\\s*>$`, "i").exec(raw);
  const innerEnd = Math.max(innerStart, close ? span.end - close[0].length : span.end);
  return {
    fragment: html.slice(innerStart, innerEnd),
    start: innerStart,
    end: innerEnd,
    openTagEnd: open ? innerStart : null,
    found: true
  };
}

export function extractPage(html: string): ExtractedPage {
  const $ = loadWithOffsets(html);
  const region = extractMainRegion(html, $);
  const container = region.found ? findMainContainer($) : null;
  const candidates = container ? $(container).find(BLOCK_SELECTOR) : $<Element, string>(BLOCK_SELECTOR);

  const blocks: Block[] = [];
  candidates.each((_, el) => {
    if (hasBlockAncestor(el, container)) return;
    if ($(el).closest(PREVIEW_BOILERPLATE_SELECTOR).length) return;
    const span = elementSpan(el);
    if (!span) return;
    const segments = textSegments(el);
    const text = segments.map((s) => s.text).join(" ");
    if (!text) return;
    const tag = el.tagName.toLowerCase();
    const kind = tagToKind(tag);
    const meta: Block["meta"] = {};
    if (kind === "heading") meta.headingLevel = Number(tag.slice(1));
    blocks.push({
      blockId: `b_${String(blocks.length + 1).padStart(4, "0")}`,
      kind,
      tag,
      position: blocks.length,
      start: span.start,
      end: span.end,
      rawMarkup: html.slice(span.start, span.end),
      text,
      segments,
      meta
    });
  });

  return { region, blocks };
}

export function extractBlocks(html: string): Block[] {
  return extractPage(html).blocks;
}

/**
 * Runs of inline content inside `el`, split at block-level descendants, with
 * their offsets and collapsed text. A block without nested blocks has one
 * segment: its inner content. Whitespace-only runs are dropped.
 */
export function textSegments(el: Element): TextSegment[] {
  const out: TextSegment[] = [];
  collectSegments(el, out);
  return out;
}

function collectSegments(el: Element, out: TextSegment[]): void {
  let run: ChildNode[] = [];
  const flush = (): void => {
    const nodes = run;
    run = [];
    const first = nodes[0];
    const last = nodes[nodes.length - 1];
    if (!first || !last || first.startIndex === null || last.endIndex === null) return;
    const text = collapseWhitespace(nodes.map(nodeText).join(""));
    if (text) out.push({ start: first.startIndex, end: last.endIndex + 1, text });
  };
  for (const child of el.children) {
    if (isTag(child) && BLOCK_LEVEL_TAGS.has(child.tagName.toLowerCase())) {
      flush();
      collectSegments(child, out);
    } else {
      run.push(child);
    }
  }
  flush();
}

function nodeText(node: AnyNode): string {
  if (isText(node)) return node.data;
  if (!isTag(node)) return "";
  if (node.tagName.toLowerCase() === "br") return " ";
  return node.children.map(nodeText).join("");
}

/** Removes the preview build's own banners and notices, by offset. */
export function withoutPreviewBoilerplate(html: string): string {
  if (!html.includes("preview-")) return html;
  const $ = loadWithOffsets(html);
  const edits: Edit[] = [];
  $<Element, string>(PREVIEW_BOILERPLATE_SELECTOR).each((_, el) => {
    const span = elementSpan(el);
    if (span) edits.push({ start: span.start, end: span.end, replacement: "" });
  });
  return applyEdits(html, edits);
}

function hasBlockAncestor(el: Element, stop: Element | null): boolean {
  let p = el.parent;
  while (p && p !== stop) {
    if (isTag(p) && BLOCK_TAGS.has(p.tagName.toLowerCase())) return true;
    p = p.parent;
  }
  return false;
}

function tagToKind(tag: string): BlockKind {
  if (tag === "li") return "list_item";
  if (tag === "blockquote") return "blockquote";
  if (/^h[1-6]$/.test(tag)) return "heading";
  return "paragraph";
}
