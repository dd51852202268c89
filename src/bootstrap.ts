import { AppConfig } from "./config";
import { DatabaseHandle, Logger } from "./models/geo-data";
import {
  DatabaseRefresher,
  DatabaseRefresherOptions,
} from "./services/database-refresher";
import { readDatabaseFromFile } from "./services/geo-database";
import { GeoServer } from "./services/geo-server";

export interface GeoService {
  server: GeoServer;
  refresher: DatabaseRefresher | null;
}

export interface BootstrapOverrides {
  readFile?: (dbFile: string) => Promise<DatabaseHandle>;
  refresher?: Partial<
    Omit<DatabaseRefresherOptions, "url" | "sink" | "lastKnownModified">
  >;
  logger?: Logger;
}

/**
 * Load the initial database and wire the lookup server to its refresher.
 *
 * The lookup server is started with the initial database installed; the
 * refresher is returned unstarted. Rejects when no initial database can be
 * obtained, since the service must not answer lookups without one.
 */
export async function createGeoService(
  config: AppConfig,
  overrides: BootstrapOverrides = {}
): Promise<GeoService> {
  const logger = overrides.logger ?? console;
  const readFile = overrides.readFile ?? readDatabaseFromFile;

  let initial: DatabaseHandle | null = null;
  if (config.dbFile) {
    logger.log(`Reading database from ${config.dbFile}`);
    initial = await readFile(config.dbFile);
  }

  const server = new GeoServer({ cacheSize: config.cacheSize, logger });

  const refresher = config.dbUrl
    ? new DatabaseRefresher({
        shortInterval: config.shortInterval,
        longInterval: config.longInterval,
        databaseNames: config.databaseNames,
        logger,
        ...overrides.refresher,
        url: config.dbUrl,
        sink: server,
        lastKnownModified: initial?.lastModified ?? null,
      })
    : null;

  if (!initial) {
    if (!refresher) {
      throw new Error("No database configured");
    }
    logger.log(`Fetching initial database from ${refresher.source}`);
    initial = await refresher.fetchLatest();
    if (!initial) {
      throw new Error(`No database returned by ${refresher.source}`);
    }
  }

  server.start();
  await server.replaceDatabase(initial);
  logger.log(
    `Database ${initial.source} loaded (modified ${initial.lastModified.toISOString()})`
  );

  return { server, refresher };
}
