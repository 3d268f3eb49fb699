/**
 * CLI argument parsing and validation
 */

import path from "node:path";
import minimist from "minimist";
import { mirrorPage } from "./mirror.js";
import { errorMessage, FetchError } from "./network/errors.js";
import { createRequestClient, DEFAULT_MAX_BYTES } from "./network/fetch.js";

export const USAGE =
  "Usage: css-mirror <url> [--out site_dump] [--timeout 20] [--maxBytes 10485760] [--userAgent <string>]";

export const DEFAULT_OUT_DIR = "site_dump";
export const DEFAULT_TIMEOUT_SECONDS = 20;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  url: string;
  outDir: string;
  timeoutSeconds: number;
  maxBytes: number;
  userAgent?: string;
}

function positiveInt(name: string, value: unknown): number {
  const text = String(value).trim();
  const n = Number(text);
  if (!/^\d+$/.test(text) || !Number.isSafeInteger(n) || n <= 0) {
    throw new UsageError(`--${name} must be a positive integer, got "${text}"`);
  }
  return n;
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(args: string[]): CliOptions {
  const argv = minimist(args, {
    string: ["out", "timeout", "maxBytes", "userAgent"],
    default: {
      out: DEFAULT_OUT_DIR,
      timeout: String(DEFAULT_TIMEOUT_SECONDS),
      maxBytes: String(DEFAULT_MAX_BYTES),
    },
  });

  const [start] = argv._;
  if (!start) {
    throw new UsageError("Missing target URL");
  }

  let startUrl: URL;
  try {
    startUrl = new URL(String(start));
  } catch {
    throw new UsageError(`Invalid URL provided: ${start}`);
  }
  if (startUrl.protocol !== "http:" && startUrl.protocol !== "https:") {
    throw new UsageError(`Only http and https URLs are supported: ${start}`);
  }

  const out = String(argv.out).trim();
  if (!out) {
    throw new UsageError("--out must not be empty");
  }

  return {
    url: startUrl.toString(),
    outDir: path.resolve(process.cwd(), out),
    timeoutSeconds: positiveInt("timeout", argv.timeout),
    maxBytes: positiveInt("maxBytes", argv.maxBytes),
    userAgent: argv.userAgent ? String(argv.userAgent) : undefined,
  };
}

/**
 * Parse CLI arguments and mirror the page. Resolves to the process exit code.
 */
export async function runCLI(args: string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(err.message);
    console.error(USAGE);
    return 1;
  }

  const client = createRequestClient({
    timeoutMs: options.timeoutSeconds * 1000,
    maxBytes: options.maxBytes,
    userAgent: options.userAgent,
  });

  try {
    const result = await mirrorPage({
      url: options.url,
      outDir: options.outDir,
      client,
    });
    console.log("\nDone.");
    console.log(`Output directory: ${result.outDir}`);
    console.log(`CSS files downloaded: ${result.count}`);
    return 0;
  } catch (err) {
    if (!(err instanceof FetchError)) throw err;
    console.error(`[error] Failed to fetch page: ${errorMessage(err)}`);
    return 1;
  }
}
