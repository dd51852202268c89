import type { CityResponse } from "maxmind";

/**
 * Record returned by the database decoder. Country editions fill a subset
 * of the city fields.
 */
export type GeoRecord = CityResponse;

/**
 * An opened, read-only geolocation database together with the timestamp of
 * the data it was built from.
 */
export interface DatabaseHandle {
  /** File path or (redacted) URL the database was loaded from */
  readonly source: string;
  /** Modification time of the data, not of the local install */
  readonly lastModified: Date;
  /**
   * Look up a normalized address. Returns null when the address is not in
   * the database and throws when the decoder fails or the handle is closed.
   */
  lookup(ip: string): GeoRecord | null;
  close(): void;
}

/**
 * Interface representing the result of a geolocation lookup
 */
export type LookupResult =
  | { ok: true; ip: string; data: Buffer }
  | { ok: false; ip: string; error: string };

export interface GeoServerStatus {
  source: string | null;
  lastModified: Date | null;
  cachedEntries: number;
}

/**
 * Anything that accepts a freshly opened database for installation.
 */
export interface DatabaseSink {
  replaceDatabase(database: DatabaseHandle): Promise<void>;
}

export type Logger = Pick<Console, "debug" | "log" | "warn" | "error">;
