import { Opportunity } from "./schema.js";
import type { NormalizedOpportunity, RawRecord } from "./schema.js";
import { resolveDate, resolveTimestamp } from "./dates.js";
import { daysBetween } from "../util/time.js";

export interface NormalizeOptions {
  /** Reference date (YYYY-MM-DD) for `days_to_close`. */
  today: string;
}

const DERIVED_KEYS = ["days_to_close", "derived"] as const;

function optionalString(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function text(value: unknown): string {
  return optionalString(value) ?? "";
}

function optionalNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.replace(/[$,\s]/g, ""));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Accepts a list, a single tag or nothing. Duplicates collapse, first occurrence wins.
 */
function tagList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : value === null || value === undefined ? [] : [value];
  const tags: string[] = [];
  for (const item of items) {
    const tag = optionalString(item);
    if (tag && !tags.includes(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

/**
 * Drop attributes recomputed on load so a record can be written back to the catalog.
 */
export function stripDerived(record: RawRecord): RawRecord {
  const stored: RawRecord = { ...record };
  for (const key of DERIVED_KEYS) {
    delete stored[key];
  }
  return stored;
}

/**
 * Give a raw record every opportunity attribute, defaulting the missing ones,
 * and attach the derived date attributes. Unknown keys are kept.
 */
export function normalizeRecord(raw: RawRecord, options: NormalizeOptions): NormalizedOpportunity {
  const opportunity = Opportunity.parse({
    ...stripDerived(raw),
    id: optionalString(raw.id),
    source: optionalString(raw.source),
    type: optionalString(raw.type),
    url: optionalString(raw.url),
    title: text(raw.title),
    description: text(raw.description),
    agency: optionalString(raw.agency),
    jurisdiction: optionalString(raw.jurisdiction),
    lga: optionalString(raw.lga),
    audience: tagList(raw.audience),
    discipline: tagList(raw.discipline),
    open_date: optionalString(raw.open_date),
    close_date: optionalString(raw.close_date),
    status: optionalString(raw.status),
    amount_min: optionalNumber(raw.amount_min),
    amount_max: optionalNumber(raw.amount_max),
    last_seen: optionalString(raw.last_seen),
  });

  const closeDate = resolveDate(opportunity.close_date);
  const lastSeen = resolveTimestamp(opportunity.last_seen);

  return {
    ...opportunity,
    days_to_close: closeDate.status === "resolved" ? daysBetween(options.today, closeDate.date) : null,
    derived: { closeDate, lastSeen },
  };
}

export function normalizeAll(raws: RawRecord[], options: NormalizeOptions): NormalizedOpportunity[] {
  return raws.map((raw) => normalizeRecord(raw, options));
}

/**
 * Stored form of a normalized record: derived attributes removed.
 */
export function toStoredRecord(record: NormalizedOpportunity): Opportunity {
  return Opportunity.parse(stripDerived(record));
}
