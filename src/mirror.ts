/**
 * Page mirroring pipeline
 */

import path from "node:path";
import { fetchText, type RequestClient } from "./network/fetch.js";
import { CSS_DIR, type FailedStylesheet, rewriteAndSaveHTML } from "./processors/html.js";
import { ensureDir } from "./utils/filesystem.js";

export interface MirrorOptions {
  url: string;
  outDir: string;
  client: RequestClient;
}

export interface MirrorResult {
  /** Absolute output directory */
  outDir: string;
  indexPath: string;
  /** Page URL after redirects; stylesheet hrefs resolve against it */
  pageUrl: string;
  stylesheets: Map<string, string>;
  failed: FailedStylesheet[];
  count: number;
}

/**
 * Mirror one page and its linked stylesheets into outDir.
 * Throws FetchError when the page itself cannot be fetched; stylesheet
 * failures are reported in the result instead.
 */
export async function mirrorPage(options: MirrorOptions): Promise<MirrorResult> {
  const outDir = path.resolve(options.outDir);
  await ensureDir(outDir);
  await ensureDir(path.join(outDir, CSS_DIR));

  const page = await fetchText(options.url, options.client);
  const { indexPath, stylesheets, failed } = await rewriteAndSaveHTML(
    page.url,
    page.body,
    outDir,
    options.client,
  );

  return {
    outDir,
    indexPath,
    pageUrl: page.url,
    stylesheets,
    failed,
    count: stylesheets.size,
  };
}
