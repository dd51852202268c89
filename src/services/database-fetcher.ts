/**
 * Minimal view of an HTTP response, satisfied by the global fetch Response
 */
export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type HttpGet = (
  url: string,
  headers: Record<string, string>
) => Promise<HttpResponse>;

export type FetchResult =
  | { status: "not-modified" }
  | { status: "modified"; archive: Buffer; lastModified: Date };

const defaultHttpGet: HttpGet = (url, headers) => fetch(url, { headers });

/**
 * Hide credentials carried in the query string before a URL is logged
 */
export function redactUrl(url: string): string {
  return url.replace(/(license_key=)[^&]*/gi, "$1***");
}

/**
 * Parse an HTTP-date header value
 */
export function parseHttpDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Conditional GET for the database archive.
 *
 * A server that ignores If-Modified-Since and answers 200 with a copy that
 * is not newer than `lastModified` is reported as not modified.
 */
export async function fetchDatabaseArchive(
  url: string,
  lastModified: Date | null,
  httpGet: HttpGet = defaultHttpGet
): Promise<FetchResult> {
  const headers: Record<string, string> = {};
  if (lastModified) {
    headers["If-Modified-Since"] = lastModified.toUTCString();
  }

  let response: HttpResponse;
  try {
    response = await httpGet(url, headers);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(
      `Unable to get database from ${redactUrl(url)}: ${message}`
    );
  }

  if (response.status === 304) {
    return { status: "not-modified" };
  }

  if (response.status !== 200) {
    throw new Error(
      `Unexpected status ${response.status} fetching database from ${redactUrl(url)}`
    );
  }

  const header = response.headers.get("Last-Modified");
  const remoteModified = parseHttpDate(header);
  if (!remoteModified) {
    throw new Error(
      `Unable to parse Last-Modified header "${header ?? ""}" from ${redactUrl(url)}`
    );
  }

  if (lastModified && remoteModified.getTime() <= lastModified.getTime()) {
    return { status: "not-modified" };
  }

  const archive = Buffer.from(await response.arrayBuffer());
  return { status: "modified", archive, lastModified: remoteModified };
}
