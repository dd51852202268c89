import { LRUCache } from "lru-cache";

export const DEFAULT_CACHE_SIZE = 50000;

/**
 * Bounded map from normalized IP address to a serialized lookup result.
 *
 * Only ever touched from inside the GeoServer loop, so it does no locking
 * of its own.
 */
export class ResponseCache {
  private readonly entries: LRUCache<string, Buffer>;

  constructor(public readonly capacity: number = DEFAULT_CACHE_SIZE) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new Error(`Cache capacity must be a positive integer: ${capacity}`);
    }
    this.entries = new LRUCache<string, Buffer>({ max: capacity });
  }

  /**
   * Get a cached result and mark it as recently used
   */
  get(key: string): Buffer | undefined {
    return this.entries.get(key);
  }

  /**
   * Store a result, evicting the least recently used entry when full
   */
  put(key: string, value: Buffer): void {
    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
