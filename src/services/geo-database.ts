import fs from "fs";
import { Reader } from "maxmind";
import { DatabaseHandle, GeoRecord } from "../models/geo-data";

// "\xab\xcd\xefMaxMind.com", opens the metadata section at the end of the file
const METADATA_MARKER = Buffer.from("abcdef4d61784d696e642e636f6d", "hex");

export type RecordReader = Pick<Reader<GeoRecord>, "get">;

/**
 * MaxMind database opened from an in-memory buffer
 */
export class GeoDatabase implements DatabaseHandle {
  private reader: RecordReader | null;

  constructor(
    reader: RecordReader,
    public readonly source: string,
    public readonly lastModified: Date
  ) {
    this.reader = reader;
  }

  lookup(ip: string): GeoRecord | null {
    if (!this.reader) {
      throw new Error(`Database ${this.source} is closed`);
    }
    return this.reader.get(ip);
  }

  /**
   * Drop the reader so the underlying buffer can be reclaimed
   */
  close(): void {
    this.reader = null;
  }

  get closed(): boolean {
    return this.reader === null;
  }
}

/**
 * Open a MaxMind database from raw (uncompressed) bytes
 */
export function openDatabase(
  data: Buffer,
  source: string,
  lastModified: Date
): GeoDatabase {
  if (data.lastIndexOf(METADATA_MARKER) === -1) {
    throw new Error(
      `Unable to open database from ${source}: no MaxMind metadata section`
    );
  }

  let reader: Reader<GeoRecord>;
  try {
    reader = new Reader<GeoRecord>(data);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to open database from ${source}: ${message}`);
  }
  return new GeoDatabase(reader, source, lastModified);
}

/**
 * Read the database and its timestamp from a file
 */
export async function readDatabaseFromFile(
  dbFile: string
): Promise<GeoDatabase> {
  let data: Buffer;
  let stats: fs.Stats;
  try {
    data = await fs.promises.readFile(dbFile);
    stats = await fs.promises.stat(dbFile);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to read db file ${dbFile}: ${message}`);
  }

  return openDatabase(data, dbFile, stats.mtime);
}
