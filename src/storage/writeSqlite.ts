import { mkdir } from "node:fs/promises";
import path from "node:path";
import Database from "better-sqlite3";
import type { NormalizedOpportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";
import { toStoredRecord } from "../transform/normalize.js";
import { nowISO } from "../util/time.js";

const KNOWN_COLUMNS = [
  "id", "source", "type", "url", "title", "description", "agency", "jurisdiction", "lga",
  "audience", "discipline", "open_date", "close_date", "status", "amount_min", "amount_max", "last_seen",
];

/**
 * Attributes outside the opportunity schema, kept as JSON in the `extra` column.
 */
function extraAttributes(opp: NormalizedOpportunity): Record<string, unknown> {
  const stored = toStoredRecord(opp);
  return Object.fromEntries(Object.entries(stored).filter(([key]) => !KNOWN_COLUMNS.includes(key)));
}

/**
 * Key a record without an id by its URL, then its title.
 */
export function rowKey(opp: NormalizedOpportunity): string {
  return opp.id || opp.url || `title:${opp.title}`;
}

/**
 * Write a view to an SQLite database, upserting by id.
 * Tag lists and extra attributes are stored as JSON text.
 */
export async function writeSqlite(
  opportunities: NormalizedOpportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  await mkdir(outDir, { recursive: true });

  const dbPath = path.join(outDir, "opportunities.sqlite");
  const db = new Database(dbPath);

  try {
    db.exec(`
      CREATE TABLE IF NOT EXISTS opportunities (
        id TEXT PRIMARY KEY,
        source TEXT,
        type TEXT,
        url TEXT,
        title TEXT NOT NULL DEFAULT '',
        description TEXT NOT NULL DEFAULT '',
        agency TEXT,
        jurisdiction TEXT,
        lga TEXT,
        audience TEXT, -- JSON array stored as text
        discipline TEXT, -- JSON array stored as text
        open_date TEXT,
        close_date TEXT,
        status TEXT,
        amount_min REAL,
        amount_max REAL,
        last_seen TEXT,
        extra TEXT, -- JSON stored as text
        exported_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_close_date ON opportunities(close_date);
      CREATE INDEX IF NOT EXISTS idx_jurisdiction ON opportunities(jurisdiction);
    `);

    const stmt = db.prepare(`
      INSERT INTO opportunities (
        id, source, type, url, title, description, agency, jurisdiction, lga,
        audience, discipline, open_date, close_date, status, amount_min,
        amount_max, last_seen, extra, exported_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        source = excluded.source,
        type = excluded.type,
        url = excluded.url,
        title = excluded.title,
        description = excluded.description,
        agency = excluded.agency,
        jurisdiction = excluded.jurisdiction,
        lga = excluded.lga,
        audience = excluded.audience,
        discipline = excluded.discipline,
        open_date = excluded.open_date,
        close_date = excluded.close_date,
        status = excluded.status,
        amount_min = excluded.amount_min,
        amount_max = excluded.amount_max,
        last_seen = excluded.last_seen,
        extra = excluded.extra,
        exported_at = excluded.exported_at
    `);

    const exportedAt = nowISO();
    const insertMany = db.transaction((opps: NormalizedOpportunity[]) => {
      for (const opp of opps) {
        stmt.run(
          rowKey(opp),
          opp.source,
          opp.type,
          opp.url,
          opp.title,
          opp.description,
          opp.agency,
          opp.jurisdiction,
          opp.lga,
          JSON.stringify(opp.audience),
          JSON.stringify(opp.discipline),
          opp.open_date,
          opp.close_date,
          opp.status,
          opp.amount_min,
          opp.amount_max,
          opp.last_seen,
          JSON.stringify(extraAttributes(opp)),
          exportedAt
        );
      }
    });

    insertMany(opportunities);

    logger.info({ dbPath, count: opportunities.length }, "Wrote SQLite database");
    return dbPath;
  } finally {
    db.close();
  }
}
