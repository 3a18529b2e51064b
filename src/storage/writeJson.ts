import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { NormalizedOpportunity, Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";
import { isJsonLines } from "./readCatalog.js";

export type ExportedOpportunity = Opportunity & { days_to_close: number | null };

/**
 * View export shape: the stored attributes plus `days_to_close`.
 */
export function toExportRecord(record: NormalizedOpportunity): ExportedOpportunity {
  const { derived: _derived, ...exported } = record;
  return exported;
}

/**
 * Write the catalog back in the format its extension implies (JSON array or JSON Lines).
 */
export async function writeCatalog(filePath: string, records: Opportunity[], logger: Logger): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });

  const content = isJsonLines(filePath)
    ? records.map((record) => JSON.stringify(record)).join("\n") + "\n"
    : JSON.stringify(records, null, 2);

  await writeFile(filePath, content, "utf-8");

  logger.info({ filePath, count: records.length }, "Wrote catalog");
}

/**
 * Write a view to opportunities.json with pretty formatting.
 */
export async function writeJson(
  opportunities: NormalizedOpportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const filePath = path.join(outDir, "opportunities.json");
  const json = JSON.stringify(opportunities.map(toExportRecord), null, 2);

  await writeFile(filePath, json, "utf-8");

  logger.info({ filePath, count: opportunities.length }, "Wrote JSON file");
  return filePath;
}
