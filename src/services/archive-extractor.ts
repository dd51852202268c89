import path from "path";
import { promisify } from "util";
import { gunzip } from "zlib";
import { Parser, ReadEntry } from "tar";

const gunzipAsync = promisify(gunzip);

/**
 * Database file names recognized inside a downloaded archive, in order of
 * preference
 */
export const DEFAULT_DATABASE_NAMES: readonly string[] = [
  "GeoLite2-City.mmdb",
  "GeoIP2-City.mmdb",
  "GeoLite2-Country.mmdb",
  "GeoIP2-Country.mmdb",
];

export interface ExtractedDatabase {
  name: string;
  data: Buffer;
}

/**
 * Pull the database file out of a tar+gzip archive.
 *
 * Entries are matched on their base name, so the dated directory MaxMind
 * wraps the file in does not matter. When several candidates are present
 * the one listed first in `names` wins.
 */
export async function extractDatabase(
  archive: Buffer,
  names: readonly string[] = DEFAULT_DATABASE_NAMES
): Promise<ExtractedDatabase> {
  let tarball: Buffer;
  try {
    tarball = await gunzipAsync(archive);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Unable to decompress database archive: ${message}`);
  }

  const found = await readEntries(tarball, names);

  for (const name of names) {
    const data = found.get(name);
    if (data) {
      return { name, data };
    }
  }

  throw new Error(`Database file not found in archive (looked for ${names.join(", ")})`);
}

function readEntries(
  tarball: Buffer,
  names: readonly string[]
): Promise<Map<string, Buffer>> {
  return new Promise((resolve, reject) => {
    const found = new Map<string, Buffer>();
    const parser = new Parser({ strict: true });

    parser.on("entry", (entry: ReadEntry) => {
      const name = path.posix.basename(entry.path);
      if (entry.type !== "File" || !names.includes(name)) {
        entry.resume();
        return;
      }

      const chunks: Buffer[] = [];
      entry.on("data", (chunk: Buffer) => chunks.push(chunk));
      entry.on("end", () => found.set(name, Buffer.concat(chunks)));
    });

    parser.on("error", (error: Error) => {
      reject(new Error(`Unable to read database archive: ${error.message}`));
    });

    parser.on("end", () => resolve(found));

    parser.end(tarball);
  });
}
