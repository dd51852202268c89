import { setTimeout as sleepFor } from "timers/promises";
import { DatabaseHandle, DatabaseSink, Logger } from "../models/geo-data";
import {
  DEFAULT_DATABASE_NAMES,
  ExtractedDatabase,
  extractDatabase,
} from "./archive-extractor";
import {
  FetchResult,
  fetchDatabaseArchive,
  redactUrl,
} from "./database-fetcher";
import { openDatabase } from "./geo-database";

export const DEFAULT_SHORT_INTERVAL = 5 * 60 * 1000; // 5 minutes
export const DEFAULT_LONG_INTERVAL = 60 * 60 * 1000; // 1 hour

export interface RefreshState {
  lastKnownModified: Date | null;
  nextSleepInterval: number;
}

export interface DatabaseRefresherOptions {
  url: string;
  sink: DatabaseSink;
  /** Timestamp of the database the sink already has, if any */
  lastKnownModified?: Date | null;
  /** Interval after a miss or an error */
  shortInterval?: number;
  /** Interval after a new database was installed */
  longInterval?: number;
  databaseNames?: readonly string[];
  fetchArchive?: (url: string, lastModified: Date | null) => Promise<FetchResult>;
  extract?: (
    archive: Buffer,
    names: readonly string[]
  ) => Promise<ExtractedDatabase>;
  open?: (data: Buffer, source: string, lastModified: Date) => DatabaseHandle;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = async (ms: number, signal: AbortSignal): Promise<void> => {
  await sleepFor(ms, undefined, { signal });
};

/**
 * Keeps the sink's database current by polling the remote source.
 *
 * Polls hourly once a new copy was installed and every few minutes after a
 * miss or an error. Never touches the sink's state directly; a fully opened
 * database is handed over through `replaceDatabase`.
 */
export class DatabaseRefresher {
  private readonly url: string;
  private readonly sink: DatabaseSink;
  private readonly shortInterval: number;
  private readonly longInterval: number;
  private readonly databaseNames: readonly string[];
  private readonly fetchArchive: (
    url: string,
    lastModified: Date | null
  ) => Promise<FetchResult>;
  private readonly extract: (
    archive: Buffer,
    names: readonly string[]
  ) => Promise<ExtractedDatabase>;
  private readonly open: (
    data: Buffer,
    source: string,
    lastModified: Date
  ) => DatabaseHandle;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly logger: Logger;
  private readonly refreshState: RefreshState;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: DatabaseRefresherOptions) {
    this.url = options.url;
    this.sink = options.sink;
    this.shortInterval = options.shortInterval ?? DEFAULT_SHORT_INTERVAL;
    this.longInterval = options.longInterval ?? DEFAULT_LONG_INTERVAL;
    this.databaseNames = options.databaseNames ?? DEFAULT_DATABASE_NAMES;
    this.fetchArchive =
      options.fetchArchive ??
      ((url, lastModified) => fetchDatabaseArchive(url, lastModified));
    this.extract = options.extract ?? extractDatabase;
    this.open = options.open ?? openDatabase;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? console;
    this.refreshState = {
      lastKnownModified: options.lastKnownModified ?? null,
      nextSleepInterval: this.shortInterval,
    };
  }

  get state(): Readonly<RefreshState> {
    return { ...this.refreshState };
  }

  get source(): string {
    return redactUrl(this.url);
  }

  /**
   * One conditional fetch. Resolves to the newly opened database, or null
   * when the remote copy has not changed. Throws on any failure.
   */
  async fetchLatest(): Promise<DatabaseHandle | null> {
    const result = await this.fetchArchive(
      this.url,
      this.refreshState.lastKnownModified
    );

    if (result.status === "not-modified") {
      this.logger.debug(`Database at ${this.source} not modified`);
      this.refreshState.nextSleepInterval = this.shortInterval;
      return null;
    }

    const { name, data } = await this.extract(
      result.archive,
      this.databaseNames
    );
    const database = this.open(data, this.source, result.lastModified);

    this.logger.log(
      `Fetched ${name} from ${this.source} (modified ${result.lastModified.toISOString()})`
    );
    this.refreshState.lastKnownModified = result.lastModified;
    this.refreshState.nextSleepInterval = this.longInterval;
    return database;
  }

  /**
   * Fetch and install a newer database if there is one. Errors are logged
   * and retried on the short interval. Resolves to the next sleep interval.
   */
  async checkForUpdate(): Promise<number> {
    try {
      const database = await this.fetchLatest();
      if (database) {
        this.logger.log("Updating database from web");
        await this.sink.replaceDatabase(database);
      }
    } catch (error) {
      this.logger.error(
        `Unable to update database from ${this.source}:`,
        error
      );
      this.refreshState.nextSleepInterval = this.shortInterval;
    }
    return this.refreshState.nextSleepInterval;
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.abortController = new AbortController();
    this.loop = this.run(this.abortController.signal);
  }

  async stop(): Promise<void> {
    this.abortController?.abort();
    await this.loop;
    this.loop = null;
    this.abortController = null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.sleep(this.refreshState.nextSleepInterval, signal);
      } catch (error) {
        if (!signal.aborted) {
          this.logger.error("Database refresh loop stopped:", error);
        }
        break;
      }
      await this.checkForUpdate();
    }
  }
}
