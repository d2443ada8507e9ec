/**
 * Centralized configuration for the daily weather server.
 *
 * All environment-dependent values should be read through this module.
 */

import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import {
  ARCHIVE_ENDPOINT,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TIMEZONE,
  InvalidInputError,
  assertCoordinate,
  parseSiteCatalog,
  todayIn,
  type Coordinate,
  type ReferenceSite
} from "@archive";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_SITES_PATH = path.resolve(__dirname, "..", "config", "sites.json");

/** Upper bound for the default window: ten years of days. */
export const MAX_RANGE_DAYS = 3660;

/** Saint-Brieuc centre. */
export const DEFAULT_POINT: Coordinate = { latitude: 48.514, longitude: -2.765 };

export interface AppConfig {
  port: number;
  archiveUrl: string;
  /** Civil timezone sent to the archive; also defines "today". */
  timezone: string;
  timeoutMs: number;
  sitesPath: string;
  defaultPoint: Coordinate;
  /** Length of the default window ending today, in days. */
  defaultRangeDays: number;
  /** Log each archive request URL and status code. */
  debug: boolean;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key];
  const value = typeof raw === "string" ? raw.trim() : "";
  return value ? value : undefined;
}

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readFlag(env: NodeJS.ProcessEnv, key: string): boolean {
  const value = (readString(env, key) ?? "").toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const timezone = readString(env, "ARCHIVE_TIMEZONE") ?? DEFAULT_TIMEZONE;
  // Fail at startup rather than on the first request.
  todayIn(timezone);

  const port = readNumber(env, "PORT", 3000);
  const timeoutMs = readNumber(env, "ARCHIVE_TIMEOUT_MS", DEFAULT_TIMEOUT_MS);
  if (timeoutMs <= 0) {
    throw new InvalidInputError("ARCHIVE_TIMEOUT_MS must be positive");
  }
  const defaultRangeDays = readNumber(env, "DEFAULT_RANGE_DAYS", 14);
  if (!Number.isInteger(defaultRangeDays) || defaultRangeDays < 0 || defaultRangeDays > MAX_RANGE_DAYS) {
    throw new InvalidInputError(`DEFAULT_RANGE_DAYS must be an integer between 0 and ${MAX_RANGE_DAYS}`);
  }

  return {
    port,
    archiveUrl: readString(env, "ARCHIVE_URL") ?? ARCHIVE_ENDPOINT,
    timezone,
    timeoutMs,
    sitesPath: readString(env, "SITES_PATH") ?? DEFAULT_SITES_PATH,
    defaultPoint: assertCoordinate({
      latitude: readNumber(env, "DEFAULT_LATITUDE", DEFAULT_POINT.latitude),
      longitude: readNumber(env, "DEFAULT_LONGITUDE", DEFAULT_POINT.longitude)
    }),
    defaultRangeDays,
    debug: readFlag(env, "DAILY_DEBUG")
  };
}

export function loadSiteCatalog(filePath: string): ReferenceSite[] {
  const raw: unknown = JSON.parse(readFileSync(filePath, "utf8"));
  return parseSiteCatalog(raw);
}
