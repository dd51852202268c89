import { DEFAULT_DATABASE_NAMES } from "./services/archive-extractor";
import {
  DEFAULT_LONG_INTERVAL,
  DEFAULT_SHORT_INTERVAL,
} from "./services/database-refresher";
import { DEFAULT_CACHE_SIZE } from "./services/response-cache";

export interface AppConfig {
  port: number;
  /** Local uncompressed database file */
  dbFile?: string;
  /** Remote tar+gzip archive polled for updates */
  dbUrl?: string;
  allowOrigin?: string;
  cacheSize: number;
  shortInterval: number;
  longInterval: number;
  databaseNames: readonly string[];
}

export const DEFAULT_EDITION = "GeoLite2-City";

/**
 * MaxMind download URL for an edition, authenticated by license key
 */
export function maxmindDownloadUrl(licenseKey: string, edition: string): string {
  const params = new URLSearchParams({
    edition_id: edition,
    license_key: licenseKey,
    suffix: "tar.gz",
  });
  return `https://download.maxmind.com/app/geoip_download?${params.toString()}`;
}

function positiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dbFile = env.DB || undefined;
  const licenseKey = env.MAXMIND_LICENSE_KEY || undefined;
  const edition = env.GEOIP_EDITION || DEFAULT_EDITION;

  let dbUrl = env.DB_URL || undefined;
  if (!dbUrl && licenseKey) {
    dbUrl = maxmindDownloadUrl(licenseKey, edition);
  }

  if (!dbFile && !dbUrl) {
    throw new Error(
      "No database configured: set DB, DB_URL or MAXMIND_LICENSE_KEY"
    );
  }

  return {
    port: positiveInt(env, "PORT", 3001),
    dbFile,
    dbUrl,
    allowOrigin: env.ALLOW_ORIGIN || undefined,
    cacheSize: positiveInt(env, "CACHE_SIZE", DEFAULT_CACHE_SIZE),
    shortInterval: positiveInt(
      env,
      "REFRESH_SHORT_INTERVAL_MS",
      DEFAULT_SHORT_INTERVAL
    ),
    longInterval: positiveInt(
      env,
      "REFRESH_LONG_INTERVAL_MS",
      DEFAULT_LONG_INTERVAL
    ),
    databaseNames: DEFAULT_DATABASE_NAMES,
  };
}
