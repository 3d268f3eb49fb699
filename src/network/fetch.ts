/**
 * Network fetch utilities
 */

import { decodeBody } from "./encoding.js";
import { FetchError, toFetchError } from "./errors.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36";

const BASE_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

export const DEFAULT_TIMEOUT_MS = 20_000;
export const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

export interface RequestClientOptions {
  timeoutMs?: number;
  maxBytes?: number;
  userAgent?: string;
}

/**
 * Request settings shared by every fetch of a run.
 * Built once and passed to each call.
 */
export interface RequestClient {
  readonly headers: Readonly<Record<string, string>>;
  readonly timeoutMs: number;
  readonly maxBytes: number;
}

export interface FetchResult {
  /** Final URL after redirects */
  url: string;
  status: number;
  contentType: string | null;
  body: string;
  encoding: string;
}

export function createRequestClient(options: RequestClientOptions = {}): RequestClient {
  const headers = { ...BASE_REQUEST_HEADERS };
  if (options.userAgent) {
    headers["User-Agent"] = options.userAgent;
  }
  return {
    headers,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    maxBytes: options.maxBytes ?? DEFAULT_MAX_BYTES,
  };
}

/**
 * GET a URL and decode its body as text.
 * Follows redirects; throws FetchError on network failure, timeout, non-2xx status
 * or a body larger than client.maxBytes.
 */
export async function fetchText(url: string, client: RequestClient): Promise<FetchResult> {
  let res: Response;
  try {
    res = await fetch(url, {
      redirect: "follow",
      headers: client.headers,
      signal: AbortSignal.timeout(client.timeoutMs),
    });
  } catch (err) {
    throw toFetchError(url, err, client.timeoutMs);
  }

  if (!res.ok) {
    discardBody(res);
    throw FetchError.http(url, res.status, res.statusText);
  }

  let bytes: Uint8Array;
  try {
    bytes = await readBodyWithLimit(res, url, client.maxBytes);
  } catch (err) {
    throw toFetchError(url, err, client.timeoutMs);
  }

  const contentType = res.headers.get("content-type");
  const { text, encoding } = decodeBody(bytes, contentType);

  return {
    url: res.url || url,
    status: res.status,
    contentType,
    body: text,
    encoding,
  };
}

/**
 * Read the whole body, refusing anything larger than maxBytes
 */
async function readBodyWithLimit(
  res: Response,
  url: string,
  maxBytes: number,
): Promise<Uint8Array> {
  const header = res.headers.get("content-length");
  if (header) {
    const contentLength = Number.parseInt(header, 10);
    if (Number.isFinite(contentLength) && contentLength > maxBytes) {
      discardBody(res);
      throw FetchError.sizeLimit(url, maxBytes);
    }
  }

  if (!res.body) {
    return new Uint8Array(0);
  }

  const chunks: Uint8Array[] = [];
  let total = 0;
  const reader = res.body.getReader();
  try {
    let result = await reader.read();
    while (!result.done) {
      total += result.value.byteLength;
      if (total > maxBytes) {
        void reader.cancel().catch(() => undefined);
        throw FetchError.sizeLimit(url, maxBytes);
      }
      chunks.push(result.value);
      result = await reader.read();
    }
  } finally {
    reader.releaseLock();
  }

  return Buffer.concat(chunks, total);
}

/**
 * Release the connection without waiting for the cancel to settle
 */
function discardBody(res: Response): void {
  if (res.body && !res.bodyUsed) {
    void res.body.cancel().catch(() => undefined);
  }
}
