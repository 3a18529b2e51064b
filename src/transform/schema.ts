import { z } from "zod";
import type { DateResolution } from "./dates.js";

export const LISTING_TYPES = ["grant", "tender"] as const;
export type ListingType = (typeof LISTING_TYPES)[number];

/**
 * Stored opportunity shape. Every attribute is present after normalization;
 * keys the pipeline does not know about are carried through untouched.
 */
export const Opportunity = z
  .object({
    id: z.string().nullable(),
    source: z.string().nullable(),
    type: z.string().nullable(), // "grant" | "tender" once classified
    url: z.string().nullable(),
    title: z.string(),
    description: z.string(),
    agency: z.string().nullable(),
    jurisdiction: z.string().nullable(), // "VIC", "Commonwealth", ...
    lga: z.string().nullable(),
    audience: z.array(z.string()),
    discipline: z.array(z.string()),
    open_date: z.string().nullable(), // YYYY-MM-DD
    close_date: z.string().nullable(), // YYYY-MM-DD
    status: z.string().nullable(),
    amount_min: z.number().nullable(),
    amount_max: z.number().nullable(),
    last_seen: z.string().nullable(), // YYYY-MM-DD or ISO date-time
  })
  .passthrough();

export type Opportunity = z.infer<typeof Opportunity>;

/**
 * A raw record as read from a catalog file, before normalization.
 */
export type RawRecord = Record<string, unknown>;

export interface DerivedDates {
  closeDate: DateResolution;
  lastSeen: DateResolution;
}

/**
 * Opportunity with attributes recomputed on every load. `days_to_close` is
 * negative once the close date has passed and null when it is unknown.
 */
export type NormalizedOpportunity = Opportunity & {
  days_to_close: number | null;
  derived: DerivedDates;
};
