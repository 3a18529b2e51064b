import { z } from "zod";
import type { NormalizedOpportunity } from "../transform/schema.js";

/**
 * Filter request. Every criterion is optional; an empty one imposes nothing.
 */
export const FilterRequest = z.object({
  types: z.array(z.string()).default([]),
  jurisdictions: z.array(z.string()).default([]),
  audiences: z.array(z.string()).default([]),
  disciplines: z.array(z.string()).default([]),
  amount_min: z.number().nullable().default(null),
  amount_max: z.number().nullable().default(null),
  text_query: z.string().default(""),
  locality_only: z.boolean().default(false),
});

export type FilterRequest = z.infer<typeof FilterRequest>;
export type FilterCriteria = Partial<FilterRequest>;

export interface FilterOptions {
  /** Configured locality, for `locality_only`. */
  lga: string;
}

type Predicate = (record: NormalizedOpportunity) => boolean;

export interface Facets {
  types: string[];
  jurisdictions: string[];
  audiences: string[];
  disciplines: string[];
  amountMin: number | null;
  amountMax: number | null;
}

function intersects(requested: string[], present: string[]): boolean {
  return requested.some((tag) => present.includes(tag));
}

/**
 * Every whitespace-separated term must occur in the title or in the description.
 */
export function matchesText(record: NormalizedOpportunity, query: string): boolean {
  const terms = query.trim().toLowerCase().split(/\s+/).filter((term) => term.length > 0);
  const title = record.title.toLowerCase();
  const description = record.description.toLowerCase();
  return terms.every((term) => title.includes(term) || description.includes(term));
}

export function mentionsLocality(record: NormalizedOpportunity, lga: string): boolean {
  if (record.lga === lga) return true;
  const haystack = `${record.title} ${record.description} ${record.agency ?? ""}`.toLowerCase();
  return lga.length > 0 && haystack.includes(lga.toLowerCase());
}

function buildPredicates(criteria: FilterCriteria, options: FilterOptions): Predicate[] {
  const predicates: Predicate[] = [];
  const { types, jurisdictions, audiences, disciplines, amount_min, amount_max, text_query, locality_only } =
    criteria;

  if (types && types.length > 0) {
    predicates.push((record) => record.type !== null && types.includes(record.type));
  }

  // Jurisdiction is often impossible to infer, so records without one are kept.
  if (jurisdictions && jurisdictions.length > 0) {
    predicates.push((record) => !record.jurisdiction || jurisdictions.includes(record.jurisdiction));
  }

  if (audiences && audiences.length > 0) {
    predicates.push((record) => intersects(audiences, record.audience));
  }

  if (disciplines && disciplines.length > 0) {
    predicates.push((record) => intersects(disciplines, record.discipline));
  }

  // Unknown amounts are kept; only a known bound outside the range excludes.
  if (amount_min !== undefined && amount_min !== null) {
    predicates.push((record) => record.amount_max === null || record.amount_max >= amount_min);
  }
  if (amount_max !== undefined && amount_max !== null) {
    predicates.push((record) => record.amount_min === null || record.amount_min <= amount_max);
  }

  if (locality_only) {
    predicates.push((record) => mentionsLocality(record, options.lga));
  }

  if (text_query && text_query.trim() !== "") {
    predicates.push((record) => matchesText(record, text_query));
  }

  return predicates;
}

/**
 * Records matching every supplied criterion, in input order.
 */
export function applyFilters(
  records: NormalizedOpportunity[],
  criteria: FilterCriteria,
  options: FilterOptions
): NormalizedOpportunity[] {
  const predicates = buildPredicates(criteria, options);
  return records.filter((record) => predicates.every((predicate) => predicate(record)));
}

/**
 * Distinct filterable values present in a collection.
 */
export function facets(records: NormalizedOpportunity[]): Facets {
  const distinct = (values: Array<string | null>): string[] =>
    [...new Set(values.filter((value): value is string => Boolean(value)))].sort();

  const mins = records.map((r) => r.amount_min).filter((value): value is number => value !== null);
  const maxs = records.map((r) => r.amount_max).filter((value): value is number => value !== null);

  return {
    types: distinct(records.map((r) => r.type)),
    jurisdictions: distinct(records.map((r) => r.jurisdiction)),
    audiences: distinct(records.flatMap((r) => r.audience)),
    disciplines: distinct(records.flatMap((r) => r.discipline)),
    amountMin: mins.length > 0 ? Math.min(...mins) : null,
    amountMax: maxs.length > 0 ? Math.max(...maxs) : null,
  };
}

/**
 * One "Label: values" line per facet, for the CLI.
 */
export function formatFacets(found: Facets): string[] {
  const list = (values: string[]): string => (values.length > 0 ? values.join(", ") : "—");
  const amount = (value: number | null): string => (value === null ? "?" : String(value));
  return [
    `Types: ${list(found.types)}`,
    `Jurisdictions: ${list(found.jurisdictions)}`,
    `Audiences: ${list(found.audiences)}`,
    `Disciplines: ${list(found.disciplines)}`,
    `Amounts (A$): ${amount(found.amountMin)} to ${amount(found.amountMax)}`,
  ];
}
