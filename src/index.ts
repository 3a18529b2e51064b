import path from "node:path";
import { loadConfig, rootDir } from "./config.js";
import type { AppConfig } from "./config.js";
import { getLogger } from "./util/logger.js";
import type { Logger } from "./util/logger.js";
import { todayISO } from "./util/time.js";
import { loadRules } from "./classify/rules.js";
import { enrichAll } from "./classify/classifier.js";
import { normalizeAll, toStoredRecord } from "./transform/normalize.js";
import type { NormalizedOpportunity } from "./transform/schema.js";
import { applyFilters, facets } from "./filter/filterEngine.js";
import type { Facets, FilterCriteria } from "./filter/filterEngine.js";
import { closingSoon, recentlySeen } from "./views/temporal.js";
import { findCatalogFile, readCatalog } from "./storage/readCatalog.js";
import { writeCatalog, writeJson } from "./storage/writeJson.js";
import { writeCsv } from "./storage/writeCsv.js";
import { writeSqlite } from "./storage/writeSqlite.js";
import { loadSeedEntries, makeSeedRecord, mergeSeed } from "./seed.js";
import { buildDigest, digestSubject, renderDigestHtml } from "./digest/digest.js";
import { createSmtpTransport, sendDigest } from "./digest/mailer.js";
import type { MailTransport } from "./digest/mailer.js";

export * from "./transform/schema.js";
export * from "./transform/dates.js";
export * from "./transform/normalize.js";
export * from "./classify/rules.js";
export * from "./classify/classifier.js";
export * from "./filter/filterEngine.js";
export * from "./views/temporal.js";
export * from "./digest/digest.js";
export { CatalogLoadError, findCatalogFile, readCatalog } from "./storage/readCatalog.js";
export type { MailTransport } from "./digest/mailer.js";
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";

interface CommonOptions {
  config?: AppConfig;
  /** YYYY-MM-DD; defaults to the local date. */
  today?: string;
  verbose?: boolean;
  logger?: Logger;
}

export interface EnrichOptions extends CommonOptions {
  inPath: string;
  outPath?: string;
  lga?: string;
}

export interface EnrichResult {
  outPath: string;
  total: number;
  durationMs: number;
}

export type ViewName = "recent" | "closing" | "all";

export interface ViewOptions extends CommonOptions {
  view: ViewName;
  dataPath?: string;
  filters?: FilterCriteria;
  /** Closing window; the configured default when omitted. */
  days?: number;
  outDir?: string;
  csv?: boolean;
  json?: boolean;
  sqlite?: boolean;
}

export interface ViewResult {
  dataPath: string;
  total: number;
  matched: number;
  rows: NormalizedOpportunity[];
  facets: Facets;
  written: string[];
}

export interface SeedOptions extends CommonOptions {
  dataPath?: string;
  seedPath?: string;
}

export interface SeedResult {
  dataPath: string;
  added: number;
  total: number;
}

export interface DigestRunOptions extends CommonOptions {
  dataPath?: string;
  send?: boolean;
  transport?: MailTransport;
}

export interface DigestResult {
  subject: string;
  html: string;
  newThisWeek: number;
  closingSoon: number;
  messageId?: string;
}

function resolveCommon(options: CommonOptions): { config: AppConfig; today: string; logger: Logger } {
  return {
    config: options.config ?? loadConfig(),
    today: options.today ?? todayISO(),
    logger: options.logger ?? getLogger(options.verbose ?? false),
  };
}

async function requireCatalog(config: AppConfig, preferred?: string): Promise<string> {
  const dataPath = await findCatalogFile(preferred ?? config.dataPath);
  if (!dataPath) {
    throw new Error("No catalog found (looked for grants.json, data/grants.json, grants.jsonl, data/grants.jsonl)");
  }
  return dataPath;
}

/**
 * Enrichment pass: load, normalize, classify and write the catalog back.
 */
export async function enrich(options: EnrichOptions): Promise<EnrichResult> {
  const startTime = Date.now();
  const { config, today, logger } = resolveCommon(options);

  try {
    const rules = loadRules(config.rulesPath);
    const lga = options.lga ?? config.lga;
    logger.info({ inPath: options.inPath, lga }, "Starting enrichment");

    const raw = await readCatalog(options.inPath);
    const enriched = enrichAll(normalizeAll(raw, { today }), { rules, lga, today });

    const outPath = options.outPath ?? options.inPath;
    await writeCatalog(outPath, enriched.map(toStoredRecord), logger);

    const result: EnrichResult = { outPath, total: enriched.length, durationMs: Date.now() - startTime };
    logger.info(result, "Enrichment completed");
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, "Enrichment failed");
    throw error;
  }
}

/**
 * Add the starter listings to the catalog, creating it when missing.
 */
export async function seed(options: SeedOptions = {}): Promise<SeedResult> {
  const { config, today, logger } = resolveCommon(options);

  const rules = loadRules(config.rulesPath);
  // An explicit path is used as given, even when it does not exist yet.
  const existing = options.dataPath
    ? await findCatalogFile(options.dataPath, process.cwd(), [])
    : await findCatalogFile(config.dataPath);
  const dataPath = existing ?? path.resolve(options.dataPath ?? config.dataPath ?? "grants.json");
  const current = existing ? await readCatalog(existing) : [];

  const entries = loadSeedEntries(options.seedPath ?? path.join(rootDir, "config", "seed.json"));
  const merged = mergeSeed(
    current,
    entries.map((entry) => makeSeedRecord(entry, rules, config.lga, today))
  );

  await writeCatalog(dataPath, normalizeAll(merged, { today }).map(toStoredRecord), logger);

  const result: SeedResult = { dataPath, added: merged.length - current.length, total: merged.length };
  logger.info(result, "Seeded catalog");
  return result;
}

function selectView(
  records: NormalizedOpportunity[],
  name: ViewName,
  windows: { today: string; recentDays: number; closingDays: number }
): NormalizedOpportunity[] {
  switch (name) {
    case "recent":
      return recentlySeen(records, { today: windows.today, days: windows.recentDays });
    case "closing":
      return closingSoon(records, { days: windows.closingDays });
    case "all":
      return records;
  }
}

/**
 * Load the catalog, apply filters, derive the requested view and export it.
 */
export async function view(options: ViewOptions): Promise<ViewResult> {
  const { config, today, logger } = resolveCommon(options);
  const dataPath = await requireCatalog(config, options.dataPath);

  const records = normalizeAll(await readCatalog(dataPath), { today });
  const filtered = applyFilters(records, options.filters ?? {}, { lga: config.lga });

  const rows = selectView(filtered, options.view, {
    today,
    recentDays: config.recentDays,
    closingDays: options.days ?? config.closingWindowDays,
  });

  logger.info({ dataPath, view: options.view, total: records.length, matched: rows.length }, "Built view");

  const outDir = options.outDir ?? "data";
  const written: string[] = [];
  if (options.json) written.push(await writeJson(rows, outDir, logger));
  if (options.csv) written.push(await writeCsv(rows, outDir, logger));
  if (options.sqlite) written.push(await writeSqlite(rows, outDir, logger));

  return { dataPath, total: records.length, matched: rows.length, rows, facets: facets(records), written };
}

/**
 * Build the weekly digest and either return the preview or send it by SMTP.
 */
export async function digest(options: DigestRunOptions = {}): Promise<DigestResult> {
  const { config, today, logger } = resolveCommon(options);
  const dataPath = await requireCatalog(config, options.dataPath);

  const records = normalizeAll(await readCatalog(dataPath), { today });
  const sections = buildDigest(records, {
    today,
    lga: config.lga,
    closingWindowDays: config.closingWindowDays,
    recentDays: config.recentDays,
    limit: config.digest.limit,
    onlyLocal: config.digest.onlyLocal,
  });

  const subject = digestSubject(config.digest.subjectPrefix, config.council, today);
  const html = renderDigestHtml(config.council, sections);
  const result: DigestResult = {
    subject,
    html,
    newThisWeek: sections.newThisWeek.length,
    closingSoon: sections.closingSoon.length,
  };

  if (options.send) {
    const from = config.digest.from ?? config.digest.smtp.user;
    if (!from) {
      throw new Error("DIGEST_FROM (or SMTP_USER) is required to send the digest.");
    }
    const transport = options.transport ?? createSmtpTransport(config.digest.smtp);
    result.messageId = await sendDigest({ from, to: config.digest.to, subject, html }, transport, logger);
  }

  logger.info({ dataPath, newThisWeek: result.newThisWeek, closingSoon: result.closingSoon }, "Built digest");
  return result;
}
