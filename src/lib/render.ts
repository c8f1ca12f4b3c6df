import { escapeHtml } from "./text";

export const MARKER_CLASS = {
  added: "preview-added",
  changed: "preview-changed",
  notice: "preview-content-changed-notice",
  changedBanner: "preview-changed-banner",
  homeBanner: "preview-home-changes-banner",
  toc: "preview-toc-changed"
} as const;

export const STYLE_ELEMENT_ID = "preview-highlight-styles";

export function addedSpan(innerHtml: string): string {
  return `<span class="${MARKER_CLASS.added}">${innerHtml}</span>`;
}

export function changedSpan(innerHtml: string, previousText: string): string {
  return `<span class="${MARKER_CLASS.changed}" title="Previously: ${escapeHtml(previousText)}">${innerHtml}</span>`;
}

export function renderChangeNotice(changePercent: number): string {
  return `
<div class="${MARKER_CLASS.notice}" style="background-color:#e7f3ff;border-left:4px solid #2196f3;padding:12px 16px;margin-bottom:20px;border-radius:4px;font-size:14px;">
  <p style="margin:0;"><strong>Content changes:</strong> This page has been modified in this pull request (~${changePercent}% of content changed).</p>
</div>
`;
}

export function renderHomeBanner(chapters: Array<{ id: string; title: string }>): string {
  const links = chapters
    .map((c) => `<a href="${escapeHtml(c.id)}.html">${escapeHtml(c.title)}</a>`)
    .join(", ");
  return `
<div class="${MARKER_CLASS.homeBanner}">
  <p style="margin:0;"><strong>Changes in this PR:</strong> The following chapters have been modified: ${links}</p>
</div>
`;
}

export function renderStyles(): string {
  return `<style id="${STYLE_ELEMENT_ID}">
      .${MARKER_CLASS.added}{background:#c6f6d5;text-decoration:none;}
      .${MARKER_CLASS.changed}{background:#fff3bf;border-bottom:1px dotted #b7791f;cursor:help;}
      .${MARKER_CLASS.homeBanner}{background:#fff8e1;border-left:4px solid #f59e0b;padding:12px 16px;margin-bottom:20px;border-radius:4px;}
      a.${MARKER_CLASS.toc}{font-weight:700;}
      a.${MARKER_CLASS.toc}::after{content:" \\25CF";color:#f59e0b;}
      @media print {
        .${MARKER_CLASS.added}{background:#b7f7c9 !important;}
        .${MARKER_CLASS.changed}{background:#ffe8a3 !important;}
      }
    </style>`;
}

/** Adds the marker stylesheet before `</head>` once. */
export function ensureStyles(html: string): string {
  if (html.includes(`id="${STYLE_ELEMENT_ID}"`)) return html;
  const m = /<\/head\s*>/i.exec(html);
  if (!m) return html;
  return html.slice(0, m.index) + renderStyles() + "\n" + html.slice(m.index);
}
