import { access, readFile } from "node:fs/promises";
import path from "node:path";
import type { RawRecord } from "../transform/schema.js";

export const CATALOG_CANDIDATES = ["grants.json", "data/grants.json", "grants.jsonl", "data/grants.jsonl"];

/**
 * A catalog file that could not be loaded as a whole. No partial result is returned.
 */
export class CatalogLoadError extends Error {
  constructor(
    readonly filePath: string,
    reason: string
  ) {
    super(`Failed to load catalog ${filePath}: ${reason}`);
    this.name = "CatalogLoadError";
  }
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonLines(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".jsonl";
}

/**
 * First existing catalog file: the preferred path, then the usual locations.
 */
export async function findCatalogFile(
  preferred?: string,
  baseDir = process.cwd(),
  fallbacks: string[] = CATALOG_CANDIDATES
): Promise<string | null> {
  const candidates = preferred ? [preferred, ...fallbacks] : fallbacks;
  for (const candidate of candidates) {
    const filePath = path.resolve(baseDir, candidate);
    try {
      await access(filePath);
      return filePath;
    } catch {
      continue;
    }
  }
  return null;
}

function parseJsonLines(filePath: string, content: string): unknown[] {
  const rows: unknown[] = [];
  const lines = content.split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    try {
      rows.push(JSON.parse(line));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CatalogLoadError(filePath, `line ${index + 1}: ${message}`);
    }
  });
  return rows;
}

function parseJsonArray(filePath: string, content: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(filePath, message);
  }
  if (!Array.isArray(parsed)) {
    throw new CatalogLoadError(filePath, "expected a JSON array of records");
  }
  return parsed;
}

/**
 * Load raw records from a JSON array file or a JSON Lines file (`.jsonl`).
 */
export async function readCatalog(filePath: string): Promise<RawRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(filePath, message);
  }

  const rows = isJsonLines(filePath) ? parseJsonLines(filePath, content) : parseJsonArray(filePath, content);

  return rows.map((row, index) => {
    if (!isRecord(row)) {
      throw new CatalogLoadError(filePath, `record ${index + 1} is not an object`);
    }
    return row;
  });
}
