import type { NormalizedOpportunity } from "../transform/schema.js";
import { mentionsLocality } from "../filter/filterEngine.js";
import { closingSoon, recentlySeen } from "../views/temporal.js";

// Compared upper-cased, so "vic" and "Commonwealth" both qualify.
export const DIGEST_JURISDICTIONS = ["VIC", "COMMONWEALTH"];

export interface DigestOptions {
  today: string;
  lga: string;
  closingWindowDays: number;
  recentDays: number;
  limit: number;
  onlyLocal: boolean;
}

export interface Digest {
  newThisWeek: NormalizedOpportunity[];
  closingSoon: NormalizedOpportunity[];
}

/**
 * Digest scope: state and Commonwealth listings (plus those with no known
 * jurisdiction), or only local listings when `onlyLocal` is set.
 */
export function inDigestScope(record: NormalizedOpportunity, options: Pick<DigestOptions, "lga" | "onlyLocal">): boolean {
  if (options.onlyLocal) {
    return mentionsLocality(record, options.lga);
  }
  return !record.jurisdiction || DIGEST_JURISDICTIONS.includes(record.jurisdiction.trim().toUpperCase());
}

export function buildDigest(records: NormalizedOpportunity[], options: DigestOptions): Digest {
  const scoped = records.filter((record) => inDigestScope(record, options));
  return {
    newThisWeek: recentlySeen(scoped, { today: options.today, days: options.recentDays }).slice(0, options.limit),
    closingSoon: closingSoon(scoped, { days: options.closingWindowDays }).slice(0, options.limit),
  };
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(value: string | null | undefined): string {
  return (value ?? "").replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function renderItem(record: NormalizedOpportunity): string {
  const title = escapeHtml(record.title || "Untitled");
  const url = escapeHtml(record.url);
  const type = escapeHtml(record.type) || "opportunity";
  const jurisdiction = escapeHtml(record.jurisdiction) || "—";
  const close = escapeHtml(record.close_date) || "?";
  return `<li><a href='${url}'>${title}</a> — <i>${type}</i>, ${jurisdiction} — close ${close}</li>`;
}

function renderSection(heading: string, records: NormalizedOpportunity[], emptyText: string): string {
  const body =
    records.length > 0
      ? `<ul>\n${records.map(renderItem).join("\n")}\n</ul>`
      : `<p class='muted'>${emptyText}</p>`;
  return `    <div class="sec">\n      <h3>${heading}</h3>\n      ${body}\n    </div>`;
}

export function renderDigestHtml(council: string, digest: Digest): string {
  return `<!doctype html>
<html>
  <head>
    <meta charset="utf-8" />
    <style>
      body { font-family: -apple-system, BlinkMacSystemFont, Segoe UI, Roboto, Arial, sans-serif; }
      .h { margin: 0 0 4px 0; }
      .sub { color: #444; margin: 0 0 16px 0; }
      .sec h3 { margin: 20px 0 6px 0; }
      li { margin-bottom: 6px; line-height: 1.3; }
      .muted { color: #6b7280; font-size: 12px; }
    </style>
  </head>
  <body>
    <h2 class="h">${escapeHtml(council)} — Grants &amp; Tenders Weekly Digest</h2>
    <p class="sub">Summary of new and closing opportunities.</p>
${renderSection("New this week", digest.newThisWeek, "No new items detected this week.")}
${renderSection("Closing soon", digest.closingSoon, "No items closing in the selected window.")}
    <p class="muted">Check details at the source link before applying. Dates and amounts may change.</p>
  </body>
</html>
`;
}

export function digestSubject(prefix: string, council: string, today: string): string {
  return `${prefix} ${council} grants & tenders digest — ${today}`.trim();
}
