import type { NormalizedOpportunity } from "../transform/schema.js";
import { daysBetween } from "../util/time.js";

export const RECENT_DAYS_DEFAULT = 7;

export interface RecentOptions {
  today: string;
  /** Trailing window, inclusive on both ends. */
  days?: number;
}

export interface ClosingOptions {
  days: number;
}

/**
 * Records last seen within `[today - days, today]`, most recently seen first.
 * Records without a readable `last_seen` are left out.
 */
export function recentlySeen(records: NormalizedOpportunity[], options: RecentOptions): NormalizedOpportunity[] {
  const days = options.days ?? RECENT_DAYS_DEFAULT;
  const seen: Array<{ record: NormalizedOpportunity; date: string }> = [];

  for (const record of records) {
    const lastSeen = record.derived.lastSeen;
    if (lastSeen.status !== "resolved") continue;
    const age = daysBetween(lastSeen.date, options.today);
    if (age >= 0 && age <= days) {
      seen.push({ record, date: lastSeen.date });
    }
  }

  return seen.sort((a, b) => b.date.localeCompare(a.date)).map((entry) => entry.record);
}

/**
 * Records closing within the next `days` days (today counts), soonest first.
 */
export function closingSoon(records: NormalizedOpportunity[], options: ClosingOptions): NormalizedOpportunity[] {
  const open: Array<{ record: NormalizedOpportunity; daysToClose: number }> = [];

  for (const record of records) {
    const daysToClose = record.days_to_close;
    if (daysToClose !== null && daysToClose >= 0 && daysToClose <= options.days) {
      open.push({ record, daysToClose });
    }
  }

  return open.sort((a, b) => a.daysToClose - b.daysToClose).map((entry) => entry.record);
}
