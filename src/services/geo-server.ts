import {
  DatabaseHandle,
  DatabaseSink,
  GeoRecord,
  GeoServerStatus,
  Logger,
  LookupResult,
} from "../models/geo-data";
import { IpUtil } from "./ip-util";
import { Mailbox } from "./mailbox";
import { DEFAULT_CACHE_SIZE, ResponseCache } from "./response-cache";

export interface GeoServerOptions {
  /** Initial database; lookups fail until one is installed */
  database?: DatabaseHandle | null;
  cacheSize?: number;
  serialize?: (record: GeoRecord | Record<string, never>) => Buffer;
  logger?: Logger;
}

interface Deferred<T> {
  resolve(value: T): void;
  reject(reason: Error): void;
}

type GeoServerMessage =
  | { kind: "lookup"; ip: string; reply: Deferred<LookupResult> }
  | { kind: "replace"; database: DatabaseHandle; done: Deferred<void> }
  | { kind: "status"; reply: Deferred<GeoServerStatus> };

const STOPPED = "Geo server is stopped";

function serializeJson(record: GeoRecord | Record<string, never>): Buffer {
  return Buffer.from(JSON.stringify(record), "utf8");
}

/**
 * Owns the active database and the response cache derived from it.
 *
 * Every read and every swap goes through one message loop, so a lookup sees
 * either the old database/cache pair or the new one and never a mixture.
 * Handlers run synchronously to completion between two receives.
 */
export class GeoServer implements DatabaseSink {
  private database: DatabaseHandle | null;
  private cache: ResponseCache;
  private readonly cacheSize: number;
  private readonly serialize: (
    record: GeoRecord | Record<string, never>
  ) => Buffer;
  private readonly logger: Logger;
  private readonly mailbox = new Mailbox<GeoServerMessage>();
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private stopped = false;

  constructor(options: GeoServerOptions = {}) {
    this.database = options.database ?? null;
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
    this.cache = new ResponseCache(this.cacheSize);
    this.serialize = options.serialize ?? serializeJson;
    this.logger = options.logger ?? console;
  }

  start(): void {
    if (this.loop || this.stopped) {
      return;
    }
    this.abortController = new AbortController();
    this.loop = this.run(this.abortController.signal);
  }

  /**
   * Stop the loop. Queued and later requests are answered with a failure,
   * queued databases are closed and the active database is released.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.abortController?.abort();
    await this.loop;

    for (const message of this.mailbox.drain()) {
      if (message.kind === "replace") {
        this.closeDatabase(message.database);
      }
      this.fail(message, STOPPED);
    }

    this.closeDatabase(this.database);
    this.database = null;
    this.cache = new ResponseCache(this.cacheSize);
  }

  lookup(ip: string): Promise<LookupResult> {
    if (this.stopped) {
      return Promise.resolve({ ok: false, ip, error: STOPPED });
    }
    return new Promise<LookupResult>((resolve, reject) => {
      this.mailbox.send({ kind: "lookup", ip, reply: { resolve, reject } });
    });
  }

  replaceDatabase(database: DatabaseHandle): Promise<void> {
    if (this.stopped) {
      this.closeDatabase(database);
      return Promise.reject(new Error(STOPPED));
    }
    return new Promise<void>((resolve, reject) => {
      this.mailbox.send({ kind: "replace", database, done: { resolve, reject } });
    });
  }

  status(): Promise<GeoServerStatus> {
    if (this.stopped) {
      return Promise.reject(new Error(STOPPED));
    }
    return new Promise<GeoServerStatus>((resolve, reject) => {
      this.mailbox.send({ kind: "status", reply: { resolve, reject } });
    });
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let message: GeoServerMessage;
      try {
        message = await this.mailbox.receive(signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.logger.error("Geo server loop failed to receive:", error);
        break;
      }
      try {
        this.handle(message);
      } catch (error) {
        this.logger.error(`Geo server failed to handle ${message.kind}:`, error);
        this.fail(message, "Internal error");
      }
    }
  }

  private handle(message: GeoServerMessage): void {
    switch (message.kind) {
      case "lookup":
        message.reply.resolve(this.handleLookup(message.ip));
        break;
      case "replace":
        this.handleReplace(message.database);
        message.done.resolve();
        break;
      case "status":
        message.reply.resolve({
          source: this.database?.source ?? null,
          lastModified: this.database?.lastModified ?? null,
          cachedEntries: this.cache.size,
        });
        break;
    }
  }

  private handleLookup(ip: string): LookupResult {
    const key = IpUtil.normalize(ip);
    if (key === null) {
      this.logger.error(`Unable to look up ip address ${ip}: invalid address`);
      return { ok: false, ip, error: "Invalid IP address" };
    }

    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug("Cache hit");
      return { ok: true, ip, data: cached };
    }

    if (!this.database) {
      this.logger.error(`Unable to look up ip address ${ip}: no database loaded`);
      return { ok: false, ip, error: "No database loaded" };
    }

    this.logger.debug("Cache miss, looking up geolocation info");
    let record: GeoRecord | null;
    try {
      record = this.database.lookup(key);
    } catch (error) {
      this.logger.error(`Unable to look up ip address ${ip}:`, error);
      return { ok: false, ip, error: "Lookup failed" };
    }

    let data: Buffer;
    try {
      data = this.serialize(record ?? {});
    } catch (error) {
      this.logger.error(
        `Unable to encode json response for ip address ${ip}:`,
        error
      );
      return { ok: false, ip, error: "Serialization failed" };
    }

    this.cache.put(key, data);
    return { ok: true, ip, data };
  }

  private handleReplace(database: DatabaseHandle): void {
    const previous = this.database;

    this.logger.debug(`Applying new database from ${database.source}`);
    this.database = database;
    this.logger.debug("Clearing cached lookups");
    this.cache = new ResponseCache(this.cacheSize);

    if (previous && previous !== database) {
      this.logger.debug("Closing old database");
      this.closeDatabase(previous);
    }
  }

  private fail(message: GeoServerMessage, reason: string): void {
    switch (message.kind) {
      case "lookup":
        message.reply.resolve({ ok: false, ip: message.ip, error: reason });
        break;
      case "replace":
        message.done.reject(new Error(reason));
        break;
      case "status":
        message.reply.reject(new Error(reason));
        break;
    }
  }

  private closeDatabase(database: DatabaseHandle | null): void {
    if (!database) {
      return;
    }
    try {
      database.close();
    } catch (error) {
      this.logger.error(`Error closing database ${database.source}:`, error);
    }
  }
}
