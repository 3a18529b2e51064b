import { differenceInCalendarDays, format, parseISO } from "date-fns";

/**
 * Today's calendar date (local time) as YYYY-MM-DD.
 */
export function todayISO(now: Date = new Date()): string {
  return format(now, "yyyy-MM-dd");
}

/**
 * Whole calendar days from `from` to `to` (both YYYY-MM-DD). Negative when `to` is earlier.
 */
export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

/**
 * Get current ISO timestamp (UTC).
 */
export function nowISO(): string {
  return new Date().toISOString();
}
