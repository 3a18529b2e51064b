#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { digest, enrich, seed, view } from "../index.js";
import type { ViewName } from "../index.js";
import { FilterRequest, formatFacets } from "../filter/filterEngine.js";
import type { NormalizedOpportunity } from "../transform/schema.js";

const VIEW_NAMES: ViewName[] = ["recent", "closing", "all"];

function collectList(value: string, prev: string[] = []): string[] {
  const items = value.split(",").map((c) => c.trim()).filter((c) => c.length > 0);
  return [...prev, ...items];
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseDays(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a whole number of days.");
  }
  return parsed;
}

function parseViewName(value: string): ViewName {
  const name = VIEW_NAMES.find((candidate) => candidate === value);
  if (!name) {
    throw new InvalidArgumentError(`Expected one of: ${VIEW_NAMES.join(", ")}.`);
  }
  return name;
}

function formatRow(row: NormalizedOpportunity): string {
  const days = row.days_to_close === null ? "   ?" : String(row.days_to_close).padStart(4);
  const close = row.close_date ?? "unknown";
  const where = row.jurisdiction ?? "—";
  return `${days}d  ${close.padEnd(10)}  ${(row.type ?? "?").padEnd(6)}  ${where.padEnd(12)}  ${row.title}`;
}

function fail(command: string, error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\n❌ ${command} failed:`, message);
  process.exit(1);
}

const program = new Command();

program
  .name("grant-radar")
  .description("Normalize, classify and review grant and tender listings")
  .version("1.0.0");

program
  .command("enrich")
  .description("Fill in type, jurisdiction, LGA, tags and dates inferred from listing text")
  .requiredOption("--in <path>", "Catalog to enrich (.json or .jsonl)")
  .option("--out <path>", "Output path (defaults to overwriting the input)")
  .option("--lga <name>", "Locality to tag when a listing is local")
  .option("--verbose", "Verbose logging")
  .action(async (options) => {
    try {
      const result = await enrich({
        inPath: options.in,
        outPath: options.out,
        lga: options.lga,
        verbose: options.verbose || false,
      });
      console.log(`\n✅ Enriched ${result.total} records → ${result.outPath}`);
      process.exit(0);
    } catch (error) {
      fail("Enrich", error);
    }
  });

program
  .command("seed")
  .description("Add starter listings for the local council, state and Commonwealth portals")
  .option("--data <path>", "Catalog to add to (created when missing)")
  .option("--verbose", "Verbose logging")
  .action(async (options) => {
    try {
      const result = await seed({ dataPath: options.data, verbose: options.verbose || false });
      console.log(`\n✅ Added ${result.added} seed records. Total now ${result.total}.`);
      process.exit(0);
    } catch (error) {
      fail("Seed", error);
    }
  });

program
  .command("view")
  .description("List recently seen, closing soon or all opportunities after filtering")
  .argument("<name>", "recent | closing | all", parseViewName)
  .option("--data <path>", "Catalog path (.json or .jsonl)")
  .option("--type <types>", "Listing types (comma-separated)", collectList)
  .option("--jurisdiction <codes>", "Jurisdictions (comma-separated)", collectList)
  .option("--audience <tags>", "Audience tags (comma-separated)", collectList)
  .option("--discipline <tags>", "Discipline tags (comma-separated)", collectList)
  .option("--min <amount>", "Minimum amount", parseNumber)
  .option("--max <amount>", "Maximum amount", parseNumber)
  .option("--query <text>", "Words that must appear in the title or description")
  .option("--local", "Only listings tied to the configured locality")
  .option("--days <number>", "Closing window in days", parseDays)
  .option("--facets", "List the values present in the catalog that can be filtered on")
  .option("--outDir <path>", "Export directory", "./data")
  .option("--csv", "Export opportunities.csv")
  .option("--json", "Export opportunities.json")
  .option("--sqlite", "Export opportunities.sqlite")
  .option("--verbose", "Verbose logging")
  .action(async (name: ViewName, options) => {
    try {
      const filters = FilterRequest.parse({
        types: options.type,
        jurisdictions: options.jurisdiction,
        audiences: options.audience,
        disciplines: options.discipline,
        amount_min: options.min,
        amount_max: options.max,
        text_query: options.query,
        locality_only: options.local || false,
      });

      const result = await view({
        view: name,
        dataPath: options.data,
        filters,
        days: options.days,
        outDir: options.outDir,
        csv: options.csv || false,
        json: options.json || false,
        sqlite: options.sqlite || false,
        verbose: options.verbose || false,
      });

      for (const row of result.rows) {
        console.log(formatRow(row));
      }
      console.log(`\n${result.matched} of ${result.total} opportunities (${result.dataPath})`);
      if (options.facets) {
        console.log("\nFilterable values:");
        for (const line of formatFacets(result.facets)) {
          console.log(`   ${line}`);
        }
      }
      for (const filePath of result.written) {
        console.log(`   Wrote ${filePath}`);
      }
      process.exit(0);
    } catch (error) {
      fail("View", error);
    }
  });

program
  .command("digest")
  .description("Build the weekly digest of new and closing opportunities")
  .option("--data <path>", "Catalog path (.json or .jsonl)")
  .option("--send", "Send via SMTP instead of printing the preview")
  .option("--verbose", "Verbose logging")
  .action(async (options) => {
    try {
      const result = await digest({
        dataPath: options.data,
        send: options.send || false,
        verbose: options.verbose || false,
      });
      if (result.messageId) {
        console.log(`\n✅ Digest sent: ${result.subject}`);
        console.log(`   New this week: ${result.newThisWeek}`);
        console.log(`   Closing soon: ${result.closingSoon}`);
      } else {
        console.log(`Subject: ${result.subject}\n`);
        console.log(result.html);
      }
      process.exit(0);
    } catch (error) {
      fail("Digest", error);
    }
  });

program.parse();
