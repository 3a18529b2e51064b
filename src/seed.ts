import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ClassifierRules } from "./classify/rules.js";
import { guessJurisdiction, urlHost } from "./classify/classifier.js";
import type { RawRecord } from "./transform/schema.js";

const SeedEntry = z.object({
  title: z.string().min(1),
  url: z.string().url(),
});

export type SeedEntry = z.infer<typeof SeedEntry>;

export function loadSeedEntries(filePath: string): SeedEntry[] {
  return z.array(SeedEntry).parse(JSON.parse(readFileSync(filePath, "utf-8")));
}

/**
 * Stable id derived from title and URL, so re-seeding never duplicates.
 */
export function seedId(title: string, url: string): string {
  return `seed-${createHash("sha1").update(`${title}\n${url}`).digest("hex").slice(0, 10)}`;
}

export function makeSeedRecord(entry: SeedEntry, rules: ClassifierRules, lga: string, today: string): RawRecord {
  const host = urlHost(entry.url);
  const local = rules.councilHosts.some((councilHost) => host.includes(councilHost));
  return {
    id: seedId(entry.title, entry.url),
    source: "seed",
    type: "grant",
    url: entry.url,
    title: entry.title,
    description: "",
    agency: null,
    jurisdiction: guessJurisdiction(host, rules),
    lga: local ? lga : null,
    audience: local ? ["community"] : ["business"],
    discipline: [],
    open_date: null,
    close_date: null,
    status: "open",
    amount_min: null,
    amount_max: null,
    last_seen: today,
  };
}

/**
 * Append seed records whose ids are not already in the catalog.
 */
export function mergeSeed(current: RawRecord[], seeds: RawRecord[]): RawRecord[] {
  const ids = new Set(current.map((record) => record.id));
  return [...current, ...seeds.filter((record) => !ids.has(record.id))];
}
