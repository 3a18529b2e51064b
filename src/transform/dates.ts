import { format, isValid, parse, parseISO } from "date-fns";

/**
 * Outcome of resolving a date field.
 *
 * `absent` means there was nothing to parse; `unresolved` means a value was
 * present but did not parse. Neither is an error.
 */
export type DateResolution =
  | { status: "resolved"; date: string }
  | { status: "unresolved"; input: string }
  | { status: "absent" };

const ABSENT: DateResolution = { status: "absent" };

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ]\d{2}:\d{2}/;

// Marker followed by a short non-alphanumeric gap, then a run of date-like characters.
const CLOSE_MARKER = /(close[sd]?|deadline)[^0-9A-Za-z]{0,10}([A-Za-z0-9 ,/\-:]+)/i;

const FILLER_WORDS = new Set(["on", "at", "of", "the", "and", "by", "from"]);
const WEEKDAYS = new Set([
  "monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday",
  "mon", "tue", "tues", "wed", "thu", "thur", "thurs", "fri", "sat", "sun",
]);
const ORDINAL = /^(\d{1,2})(st|nd|rd|th)$/;
// Times of day and Australian zone abbreviations written before or after a date.
const TIME_OF_DAY = /^(\d{1,2}([:.]\d{2})?(am|pm)|\d{1,2}:\d{2}|am|pm|noon|midnight)$/;
const TIME_ZONES = new Set(["aest", "aedt", "acst", "acdt", "awst", "utc", "gmt"]);
// date-fns knows "sep" but not the common "sept".
const MONTH_ALIASES = new Map([["sept", "sep"]]);
const YEAR_FIRST = /^\d{4}[-/]\d{1,2}[-/]\d{1,2}$/;

// Day-before-month first; month-first only where the day-first reading fails.
// Two-digit year formats precede four-digit ones so "25" is not read as year 0025.
const LOOSE_FORMATS = [
  "d/M/yy",
  "d/M/yyyy",
  "d-M-yy",
  "d-M-yyyy",
  "d.M.yy",
  "d.M.yyyy",
  "M/d/yyyy",
  "d MMMM yyyy",
  "MMMM d yyyy",
  "d MMMM",
  "MMMM d",
];

function resolved(date: string): DateResolution {
  return { status: "resolved", date };
}

function strictCalendarDate(value: string): string | null {
  if (!ISO_DATE.test(value)) return null;
  return isValid(parse(value, "yyyy-MM-dd", new Date(2000, 0, 1))) ? value : null;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

/**
 * Resolve a stored calendar date: `YYYY-MM-DD`, or the same with `/` separators.
 */
export function resolveDate(value: unknown): DateResolution {
  if (isBlank(value)) return ABSENT;
  if (typeof value !== "string") return { status: "unresolved", input: String(value) };

  const trimmed = value.trim();
  const date = strictCalendarDate(trimmed) ?? strictCalendarDate(trimmed.replace(/\//g, "-"));
  return date ? resolved(date) : { status: "unresolved", input: value };
}

/**
 * Resolve a date that may also be an ISO date-time (`last_seen`).
 * The calendar date written in the string is kept; no timezone conversion.
 */
export function resolveTimestamp(value: unknown): DateResolution {
  const asDate = resolveDate(value);
  if (asDate.status !== "unresolved" || typeof value !== "string") return asDate;

  const normalized = value.trim().replace(/\//g, "-");
  const match = ISO_DATE_TIME.exec(normalized);
  if (match && isValid(parseISO(normalized.replace(" ", "T")))) {
    const date = strictCalendarDate(match[1]);
    if (date) return resolved(date);
  }
  return asDate;
}

/**
 * Parse a loose, human-written date fragment such as "Friday 15th March 2025",
 * "31/03/2025" or "March 15, 2025". Trailing words after the date are ignored.
 * A fragment without a year takes the year of `today`.
 */
export function parseLooseDate(fragment: string, today: string): string | null {
  const tokens = fragment
    .toLowerCase()
    .split(/[\s,]+/)
    .map((token) => MONTH_ALIASES.get(token) ?? token.replace(ORDINAL, "$1"))
    .filter((token) => token.length > 0 && !isNoise(token));

  const reference = parseISO(today);

  // Earliest window wins; within it, the longest reading.
  for (let start = 0; start < tokens.length; start++) {
    for (let length = Math.min(tokens.length - start, 3); length >= 1; length--) {
      const date = parseCandidate(tokens.slice(start, start + length).join(" "), reference);
      if (date) return date;
    }
  }
  return null;
}

function isNoise(token: string): boolean {
  return FILLER_WORDS.has(token) || WEEKDAYS.has(token) || TIME_ZONES.has(token) || TIME_OF_DAY.test(token);
}

function parseCandidate(candidate: string, reference: Date): string | null {
  if (YEAR_FIRST.test(candidate)) {
    const parsed = parse(candidate.replace(/\//g, "-"), "yyyy-M-d", reference);
    return isValid(parsed) ? format(parsed, "yyyy-MM-dd") : null;
  }
  for (const pattern of LOOSE_FORMATS) {
    const parsed = parse(candidate, pattern, reference);
    if (isValid(parsed)) {
      return format(parsed, "yyyy-MM-dd");
    }
  }
  return null;
}

/**
 * Find a closing date in free text: the first "close(s|d)" or "deadline" marker,
 * followed by a date. Absent when no marker is present.
 */
export function extractCloseDate(text: string, today: string): DateResolution {
  const match = CLOSE_MARKER.exec(text);
  if (!match) return ABSENT;

  const date = parseLooseDate(match[2], today);
  return date ? resolved(date) : { status: "unresolved", input: match[2].trim() };
}

export function resolvedDate(resolution: DateResolution): string | null {
  return resolution.status === "resolved" ? resolution.date : null;
}
