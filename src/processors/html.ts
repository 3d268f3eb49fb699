/**
 * HTML rewriting and processing utilities
 */

import path from "node:path";
import type { RequestClient } from "../network/fetch.js";
import { errorMessage, FetchError } from "../network/errors.js";
import {
  findStylesheetLinks,
  getHref,
  parseDocument,
  serializeDocument,
  setHref,
} from "../parsers/stylesheets.js";
import { writeTextFile } from "../utils/filesystem.js";
import { makeRelative, resolveResourceUrl } from "../utils/url.js";
import { processStylesheet } from "./stylesheet.js";

export const INDEX_FILE = "index.html";
export const CSS_DIR = path.join("assets", "css");

export interface FailedStylesheet {
  url: string;
  message: string;
}

export interface RewriteResult {
  indexPath: string;
  /** Absolute stylesheet URL -> path relative to index.html */
  stylesheets: Map<string, string>;
  failed: FailedStylesheet[];
}

/**
 * Download every linked stylesheet, point its <link> at the local copy and
 * save the page as <outDir>/index.html.
 * A stylesheet that fails to download keeps its original href.
 */
export async function rewriteAndSaveHTML(
  pageUrl: string,
  html: string,
  outDir: string,
  client: RequestClient,
): Promise<RewriteResult> {
  const $ = parseDocument(html);
  const indexPath = path.join(outDir, INDEX_FILE);
  const cssDir = path.join(outDir, CSS_DIR);

  const stylesheets = new Map<string, string>();
  const failed: FailedStylesheet[] = [];

  for (const link of findStylesheetLinks($)) {
    const href = getHref(link);
    if (!href) continue;
    const cssUrl = resolveResourceUrl(pageUrl, href);
    if (!cssUrl) continue;

    try {
      const cssPath = await processStylesheet(cssUrl, link.ordinal, cssDir, client);
      const rel = makeRelative(indexPath, cssPath);
      stylesheets.set(cssUrl, rel);
      setHref(link, rel);
      console.log(`[ok] CSS saved: ${cssUrl} -> ${rel}`);
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      const message = errorMessage(err);
      failed.push({ url: cssUrl, message });
      console.log(`[warn] Failed to fetch CSS: ${cssUrl} (${message})`);
    }
  }

  await writeTextFile(indexPath, serializeDocument($));
  console.log(`[ok] HTML saved: ${indexPath}`);

  return { indexPath, stylesheets, failed };
}
