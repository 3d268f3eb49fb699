/**
 * Errors raised while fetching a resource
 */

export type FetchErrorKind = "http" | "timeout" | "network" | "size";

/**
 * A failed request: network failure, timeout, non-2xx status or oversized body.
 * Always carries the URL that was requested.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly kind: FetchErrorKind;
  readonly status?: number;

  constructor(
    message: string,
    url: string,
    kind: FetchErrorKind,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "FetchError";
    this.url = url;
    this.kind = kind;
    this.status = options.status;
  }

  static http(url: string, status: number, statusText: string): FetchError {
    const text = statusText ? ` ${statusText}` : "";
    return new FetchError(`HTTP ${status}${text}`, url, "http", { status });
  }

  static timeout(url: string, timeoutMs: number, cause?: unknown): FetchError {
    return new FetchError(`Request timed out after ${timeoutMs}ms`, url, "timeout", {
      cause,
    });
  }

  static sizeLimit(url: string, maxBytes: number): FetchError {
    return new FetchError(
      `Response exceeds maximum size of ${maxBytes} bytes`,
      url,
      "size",
    );
  }

  static network(url: string, cause: unknown): FetchError {
    return new FetchError(`Network error: ${errorMessage(cause)}`, url, "network", {
      cause,
    });
  }
}

/**
 * Map anything thrown by fetch() to a FetchError
 */
export function toFetchError(
  url: string,
  err: unknown,
  timeoutMs: number,
): FetchError {
  if (err instanceof FetchError) return err;
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return FetchError.timeout(url, timeoutMs, err);
  }
  return FetchError.network(url, err);
}

/**
 * Human-readable message for log lines
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    // undici hides the interesting part ("ECONNREFUSED", "ENOTFOUND") in cause
    const cause = err.cause;
    if (err.message === "fetch failed" && cause instanceof Error && cause.message) {
      return `${err.message}: ${cause.message}`;
    }
    return err.message || err.name;
  }
  return String(err);
}
