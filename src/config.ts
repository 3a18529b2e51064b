import { config } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

/**
 * Nearest directory above `start` holding a package.json (works from src/ and dist/src/).
 */
function findProjectRoot(start: string): string {
  let dir = start;
  while (!existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) return start;
    dir = parent;
  }
  return dir;
}

export const rootDir = findProjectRoot(__dirname);

// Load .env from project root
config({ path: path.join(rootDir, ".env") });

export interface SmtpConfig {
  host?: string;
  port: number;
  user?: string;
  pass?: string;
}

export interface DigestConfig {
  to: string[];
  from?: string;
  subjectPrefix: string;
  limit: number;
  /** Only items tied to the locality, ignoring jurisdiction. */
  onlyLocal: boolean;
  smtp: SmtpConfig;
}

export interface AppConfig {
  lga: string;
  council: string;
  closingWindowDays: number;
  recentDays: number;
  dataPath?: string;
  rulesPath: string;
  digest: DigestConfig;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${key}: ${raw}`);
  }
  return value;
}

function readFlag(env: Env, key: string): boolean {
  const raw = (env[key] ?? "").trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

function readList(env: Env, key: string): string[] {
  return (env[key] ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readOptional(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Load and validate configuration from environment variables.
 * Fails fast on values that are present but unusable.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const lga = readOptional(env, "RADAR_LGA") ?? "Wyndham";

  return {
    lga,
    council: readOptional(env, "RADAR_COUNCIL") ?? `${lga} City Council`,
    closingWindowDays: readInt(env, "RADAR_CLOSING_DAYS", 14, 0),
    recentDays: readInt(env, "RADAR_RECENT_DAYS", 7, 0),
    dataPath: readOptional(env, "RADAR_DATA_PATH"),
    rulesPath: readOptional(env, "RULES_PATH") ?? path.join(rootDir, "config", "rules.json"),
    digest: {
      to: readList(env, "DIGEST_TO"),
      from: readOptional(env, "DIGEST_FROM"),
      subjectPrefix: readOptional(env, "DIGEST_SUBJECT_PREFIX") ?? `[${lga}]`,
      limit: readInt(env, "DIGEST_LIMIT", 25, 1),
      onlyLocal: readFlag(env, "DIGEST_ONLY_LOCAL"),
      smtp: {
        host: readOptional(env, "SMTP_HOST"),
        port: readInt(env, "SMTP_PORT", 587, 1),
        user: readOptional(env, "SMTP_USER"),
        pass: readOptional(env, "SMTP_PASS"),
      },
    },
  };
}
