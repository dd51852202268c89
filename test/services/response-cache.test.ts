import { DEFAULT_CACHE_SIZE, ResponseCache } from "../../src/services/response-cache";

const bytes = (value: string) => Buffer.from(value, "utf8");

describe("ResponseCache", () => {
  it("should default to 50000 entries", () => {
    expect(new ResponseCache().capacity).toBe(50000);
    expect(DEFAULT_CACHE_SIZE).toBe(50000);
  });

  it("should keep distinct keys retrievable under capacity", () => {
    const cache = new ResponseCache(10);
    cache.put("203.0.113.5", bytes("a"));
    cache.put("198.51.100.7", bytes("b"));

    expect(cache.get("203.0.113.5")?.toString()).toBe("a");
    expect(cache.get("198.51.100.7")?.toString()).toBe("b");
    expect(cache.size).toBe(2);
  });

  it("should return undefined for a missing key", () => {
    expect(new ResponseCache(2).get("192.0.2.1")).toBeUndefined();
  });

  it("should evict exactly the least recently used key when full", () => {
    const cache = new ResponseCache(3);
    cache.put("10.0.0.1", bytes("1"));
    cache.put("10.0.0.2", bytes("2"));
    cache.put("10.0.0.3", bytes("3"));

    // Touch the oldest entry so 10.0.0.2 becomes least recently used
    expect(cache.get("10.0.0.1")?.toString()).toBe("1");

    cache.put("10.0.0.4", bytes("4"));

    expect(cache.size).toBe(3);
    expect(cache.has("10.0.0.2")).toBe(false);
    expect(cache.has("10.0.0.1")).toBe(true);
    expect(cache.has("10.0.0.3")).toBe(true);
    expect(cache.has("10.0.0.4")).toBe(true);
  });

  it("should never exceed its capacity", () => {
    const cache = new ResponseCache(5);
    for (let i = 0; i < 20; i++) {
      cache.put(`10.0.0.${i}`, bytes(String(i)));
      expect(cache.size).toBeLessThanOrEqual(5);
    }
    expect(cache.size).toBe(5);
    expect(cache.has("10.0.0.15")).toBe(true);
    expect(cache.has("10.0.0.14")).toBe(false);
  });

  it("should overwrite an existing key without growing", () => {
    const cache = new ResponseCache(2);
    cache.put("10.0.0.1", bytes("old"));
    cache.put("10.0.0.1", bytes("new"));

    expect(cache.size).toBe(1);
    expect(cache.get("10.0.0.1")?.toString()).toBe("new");
  });

  it("should drop everything on clear", () => {
    const cache = new ResponseCache(4);
    cache.put("10.0.0.1", bytes("1"));
    cache.put("10.0.0.2", bytes("2"));
    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.get("10.0.0.1")).toBeUndefined();
  });

  test.each([0, -1, 1.5, NaN])("should reject capacity %p", (capacity) => {
    expect(() => new ResponseCache(capacity)).toThrow(
      "Cache capacity must be a positive integer"
    );
  });
});
