import { loadConfig, maxmindDownloadUrl } from "../src/config";

describe("loadConfig", () => {
  it("should apply defaults around a local database", () => {
    const config = loadConfig({ DB: "/data/GeoLite2-City.mmdb" });

    expect(config).toEqual({
      port: 3001,
      dbFile: "/data/GeoLite2-City.mmdb",
      dbUrl: undefined,
      allowOrigin: undefined,
      cacheSize: 50000,
      shortInterval: 5 * 60 * 1000,
      longInterval: 60 * 60 * 1000,
      databaseNames: [
        "GeoLite2-City.mmdb",
        "GeoIP2-City.mmdb",
        "GeoLite2-Country.mmdb",
        "GeoIP2-Country.mmdb",
      ],
    });
  });

  it("should read every setting from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      DB_URL: "https://downloads.example.test/geo.tar.gz",
      ALLOW_ORIGIN: "*",
      CACHE_SIZE: "100",
      REFRESH_SHORT_INTERVAL_MS: "1000",
      REFRESH_LONG_INTERVAL_MS: "2000",
    });

    expect(config.port).toBe(8080);
    expect(config.dbFile).toBeUndefined();
    expect(config.dbUrl).toBe("https://downloads.example.test/geo.tar.gz");
    expect(config.allowOrigin).toBe("*");
    expect(config.cacheSize).toBe(100);
    expect(config.shortInterval).toBe(1000);
    expect(config.longInterval).toBe(2000);
  });

  it("should build the MaxMind URL from a license key", () => {
    const config = loadConfig({ MAXMIND_LICENSE_KEY: "test-secret" });

    expect(config.dbUrl).toBe(
      "https://download.maxmind.com/app/geoip_download?edition_id=GeoLite2-City&license_key=test-secret&suffix=tar.gz"
    );
  });

  it("should honor the configured edition", () => {
    const config = loadConfig({
      MAXMIND_LICENSE_KEY: "test-secret",
      GEOIP_EDITION: "GeoLite2-Country",
    });

    expect(config.dbUrl).toBe(
      maxmindDownloadUrl("test-secret", "GeoLite2-Country")
    );
  });

  it("should prefer an explicit URL over the license key", () => {
    const config = loadConfig({
      DB_URL: "https://mirror.example.test/db.tar.gz",
      MAXMIND_LICENSE_KEY: "test-secret",
    });

    expect(config.dbUrl).toBe("https://mirror.example.test/db.tar.gz");
  });

  it("should require a database source", () => {
    expect(() => loadConfig({ PORT: "3001" })).toThrow(
      "No database configured: set DB, DB_URL or MAXMIND_LICENSE_KEY"
    );
  });

  test.each(["abc", "0", "-5", "1.5"])("should reject PORT=%s", (value) => {
    expect(() => loadConfig({ DB: "db.mmdb", PORT: value })).toThrow(
      `PORT must be a positive integer, got "${value}"`
    );
  });
});
