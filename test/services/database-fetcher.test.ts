import {
  fetchDatabaseArchive,
  HttpGet,
  HttpResponse,
  parseHttpDate,
  redactUrl,
} from "../../src/services/database-fetcher";

const DB_URL = "https://downloads.example.test/geo.tar.gz?license_key=test-secret";

function response(
  status: number,
  headers: Record<string, string> = {},
  body = ""
): HttpResponse {
  return {
    status,
    headers: {
      get: (name: string) => headers[name.toLowerCase()] ?? null,
    },
    arrayBuffer: async () => {
      const bytes = Buffer.from(body, "utf8");
      const copy = new ArrayBuffer(bytes.length);
      new Uint8Array(copy).set(bytes);
      return copy;
    },
  };
}

describe("database-fetcher", () => {
  describe("redactUrl", () => {
    it("should hide the license key", () => {
      expect(redactUrl(DB_URL)).toBe(
        "https://downloads.example.test/geo.tar.gz?license_key=***"
      );
    });

    it("should keep other query parameters", () => {
      expect(
        redactUrl("https://x.test/dl?edition_id=GeoLite2-City&license_key=abc&suffix=tar.gz")
      ).toBe("https://x.test/dl?edition_id=GeoLite2-City&license_key=***&suffix=tar.gz");
    });
  });

  describe("parseHttpDate", () => {
    it("should parse an HTTP date", () => {
      expect(parseHttpDate("Tue, 15 Oct 2024 12:00:00 GMT")).toEqual(
        new Date("2024-10-15T12:00:00Z")
      );
    });

    it("should return null for missing or invalid values", () => {
      expect(parseHttpDate(null)).toBeNull();
      expect(parseHttpDate("")).toBeNull();
      expect(parseHttpDate("yesterday-ish")).toBeNull();
    });
  });

  describe("fetchDatabaseArchive", () => {
    it("should send no conditional header on the first fetch", async () => {
      const httpGet = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>(
        async () =>
          response(200, { "last-modified": "Tue, 15 Oct 2024 12:00:00 GMT" }, "archive")
      );

      const result = await fetchDatabaseArchive(DB_URL, null, httpGet);

      expect(httpGet).toHaveBeenCalledWith(DB_URL, {});
      expect(result).toEqual({
        status: "modified",
        archive: Buffer.from("archive"),
        lastModified: new Date("2024-10-15T12:00:00Z"),
      });
    });

    it("should send If-Modified-Since and honor 304", async () => {
      const httpGet = jest.fn<ReturnType<HttpGet>, Parameters<HttpGet>>(
        async () => response(304)
      );

      const result = await fetchDatabaseArchive(
        DB_URL,
        new Date("2024-10-15T12:00:00Z"),
        httpGet
      );

      expect(httpGet).toHaveBeenCalledWith(DB_URL, {
        "If-Modified-Since": "Tue, 15 Oct 2024 12:00:00 GMT",
      });
      expect(result).toEqual({ status: "not-modified" });
    });

    it("should treat a 200 that is not newer as not modified", async () => {
      const httpGet: HttpGet = async () =>
        response(200, { "last-modified": "Tue, 15 Oct 2024 12:00:00 GMT" }, "same");

      await expect(
        fetchDatabaseArchive(DB_URL, new Date("2024-10-15T12:00:00Z"), httpGet)
      ).resolves.toEqual({ status: "not-modified" });
    });

    it("should fail on an unexpected status without leaking the key", async () => {
      const httpGet: HttpGet = async () => response(401);

      await expect(fetchDatabaseArchive(DB_URL, null, httpGet)).rejects.toThrow(
        "Unexpected status 401 fetching database from https://downloads.example.test/geo.tar.gz?license_key=***"
      );
    });

    it("should fail when the network request fails", async () => {
      const httpGet: HttpGet = async () => {
        throw new Error("getaddrinfo ENOTFOUND downloads.example.test");
      };

      await expect(fetchDatabaseArchive(DB_URL, null, httpGet)).rejects.toThrow(
        "Unable to get database from https://downloads.example.test/geo.tar.gz?license_key=***: getaddrinfo ENOTFOUND downloads.example.test"
      );
    });

    it("should fail without a usable Last-Modified header", async () => {
      const httpGet: HttpGet = async () => response(200, {}, "archive");

      await expect(fetchDatabaseArchive(DB_URL, null, httpGet)).rejects.toThrow(
        'Unable to parse Last-Modified header ""'
      );
    });
  });
});
