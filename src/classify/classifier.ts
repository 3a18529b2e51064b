import type { ClassifierRules, TagRule } from "./rules.js";
import type { ListingType, NormalizedOpportunity } from "../transform/schema.js";
import { normalizeRecord, stripDerived } from "../transform/normalize.js";
import { extractCloseDate, resolvedDate } from "../transform/dates.js";

export interface ClassifyContext {
  rules: ClassifierRules;
  /** Locality name written to `lga` when a listing is local. */
  lga: string;
  /** YYYY-MM-DD, stamped into `last_seen` and used for `days_to_close`. */
  today: string;
}

/**
 * Lower-cased host of a URL, or "" when it has none.
 */
export function urlHost(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return "";
  }
}

export function guessJurisdiction(host: string, rules: ClassifierRules): string | null {
  for (const rule of rules.jurisdictions) {
    const matches = rule.match === "suffix" ? host.endsWith(rule.value) : host.includes(rule.value);
    if (matches) {
      return rule.jurisdiction;
    }
  }
  return null;
}

export function guessType(url: string, text: string, rules: ClassifierRules): ListingType {
  return rules.tender.url.test(url) || rules.tender.text.test(text) ? "tender" : "grant";
}

export function inferTags(text: string, rules: TagRule[]): string[] {
  return rules.filter((rule) => rule.pattern.test(text)).map((rule) => rule.tag);
}

export function isLocal(host: string, text: string, lga: string, rules: ClassifierRules): boolean {
  if (host && rules.councilHosts.some((councilHost) => host.includes(councilHost))) {
    return true;
  }
  return lga.length > 0 && text.toLowerCase().includes(lga.toLowerCase());
}

function mergeTags(existing: string[], inferred: string[]): string[] {
  return [...new Set([...existing, ...inferred])].sort();
}

/**
 * Fill in what can be inferred from a listing's text and URL.
 *
 * Singular fields are only written when empty; audience and discipline tags are
 * unioned, so running this again on its own output changes nothing.
 */
export function enrichRecord(record: NormalizedOpportunity, context: ClassifyContext): NormalizedOpportunity {
  const { rules, lga, today } = context;
  const url = (record.url ?? "").trim();
  const text = `${record.title.trim()} ${record.description.trim()}`;
  const host = urlHost(url);

  const closeDate = record.close_date || resolvedDate(extractCloseDate(text, today));

  return normalizeRecord(
    {
      ...stripDerived(record),
      type: record.type || guessType(url, text, rules),
      jurisdiction: record.jurisdiction || guessJurisdiction(host, rules),
      lga: record.lga || (isLocal(host, text, lga, rules) ? lga : record.lga),
      audience: mergeTags(record.audience, inferTags(text, rules.audience)),
      discipline: mergeTags(record.discipline, inferTags(text, rules.discipline)),
      close_date: closeDate || null,
      last_seen: record.last_seen || today,
    },
    { today }
  );
}

export function enrichAll(records: NormalizedOpportunity[], context: ClassifyContext): NormalizedOpportunity[] {
  return records.map((record) => enrichRecord(record, context));
}
