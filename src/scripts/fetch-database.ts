import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { DEFAULT_EDITION, maxmindDownloadUrl } from "../config";
import { extractDatabase } from "../services/archive-extractor";
import { fetchDatabaseArchive, redactUrl } from "../services/database-fetcher";

dotenv.config();

/**
 * Download the database archive once and write the extracted file to disk,
 * stamped with the remote Last-Modified time so it can be served with DB=
 */
async function fetchDatabase(output: string) {
  const licenseKey = process.env.MAXMIND_LICENSE_KEY;
  const url =
    process.env.DB_URL ||
    (licenseKey
      ? maxmindDownloadUrl(licenseKey, process.env.GEOIP_EDITION || DEFAULT_EDITION)
      : undefined);

  if (!url) {
    throw new Error("Set DB_URL or MAXMIND_LICENSE_KEY");
  }

  console.log(`Downloading database from ${redactUrl(url)}...`);
  const result = await fetchDatabaseArchive(url, null);
  if (result.status !== "modified") {
    throw new Error(`No database returned by ${redactUrl(url)}`);
  }

  const { name, data } = await extractDatabase(result.archive);
  const target = path.resolve(output || name);

  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, data);
  await fs.promises.utimes(target, result.lastModified, result.lastModified);

  console.log(
    `Wrote ${name} (${data.length} bytes, modified ${result.lastModified.toISOString()}) to ${target}`
  );
}

fetchDatabase(process.argv[2] ?? "").catch((error) => {
  console.error("Error fetching database:", error);
  process.exit(1);
});
