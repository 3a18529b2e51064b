import { mkdir } from "node:fs/promises";
import path from "node:path";
import { createObjectCsvWriter } from "csv-writer";
import type { NormalizedOpportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";

const CSV_HEADER = [
  { id: "title", title: "Title" },
  { id: "type", title: "Type" },
  { id: "jurisdiction", title: "Jurisdiction" },
  { id: "audience", title: "Audience" },
  { id: "discipline", title: "Discipline" },
  { id: "closeDate", title: "Closes" },
  { id: "daysToClose", title: "Days to close" },
  { id: "amountMin", title: "Min (A$)" },
  { id: "amountMax", title: "Max (A$)" },
  { id: "agency", title: "Agency" },
  { id: "url", title: "URL" },
];

/**
 * Flatten a record to the CSV columns; tag lists are joined with ", ".
 */
export function toCsvRow(opp: NormalizedOpportunity): Record<string, string> {
  return {
    title: opp.title,
    type: opp.type ?? "",
    jurisdiction: opp.jurisdiction ?? "",
    audience: opp.audience.join(", "),
    discipline: opp.discipline.join(", "),
    closeDate: opp.close_date ?? "",
    daysToClose: opp.days_to_close?.toString() ?? "",
    amountMin: opp.amount_min?.toString() ?? "",
    amountMax: opp.amount_max?.toString() ?? "",
    agency: opp.agency ?? "",
    url: opp.url ?? "",
  };
}

/**
 * Write a view to opportunities.csv (tabular subset of fields).
 */
export async function writeCsv(
  opportunities: NormalizedOpportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const filePath = path.join(outDir, "opportunities.csv");

  const csvWriter = createObjectCsvWriter({
    path: filePath,
    header: CSV_HEADER,
  });

  await csvWriter.writeRecords(opportunities.map(toCsvRow));

  logger.info({ filePath, count: opportunities.length }, "Wrote CSV file");
  return filePath;
}
