/**
 * URL manipulation utilities
 */

import path from "node:path";
import { safeFilename } from "./filesystem.js";

const FETCHABLE_PROTOCOLS = new Set(["http:", "https:"]);

/**
 * Resolve an href against the document URL.
 * Returns the absolute URL without its fragment, or null when the reference
 * cannot be fetched over HTTP(S) (data:, mailto:, javascript:, unparsable).
 */
export function resolveResourceUrl(base: string | URL, href: string): string | null {
  let url: URL;
  try {
    url = new URL(href, base);
  } catch {
    return null;
  }
  if (!FETCHABLE_PROTOCOLS.has(url.protocol)) return null;
  url.hash = "";
  return url.toString();
}

/**
 * Local filename for a stylesheet URL.
 * Falls back to style_<ordinal>.css when the path has no last segment.
 */
export function cssFilenameFor(cssUrl: string, ordinal: number): string {
  const pathname = URL.canParse(cssUrl) ? new URL(cssUrl).pathname : "";
  const base = pathname.slice(pathname.lastIndexOf("/") + 1);
  if (!base) return `style_${ordinal}.css`;
  if (base.toLowerCase().endsWith(".css")) return safeFilename(base);
  return `${safeFilename(base)}.css`;
}

/**
 * Relative path from one file to another, always with forward slashes
 */
export function makeRelative(fromFile: string, toFile: string): string {
  return path.relative(path.dirname(fromFile), toFile).replace(/\\/g, "/");
}
