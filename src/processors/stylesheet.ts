/**
 * CSS stylesheet processing utilities
 */

import path from "node:path";
import { fetchText, type RequestClient } from "../network/fetch.js";
import { writeTextFile } from "../utils/filesystem.js";
import { cssFilenameFor } from "../utils/url.js";

/**
 * Download a stylesheet and save it under cssDir.
 * Returns the local path; an existing file with the same name is overwritten.
 * FetchError propagates so the caller can decide whether to carry on.
 */
export async function processStylesheet(
  cssUrl: string,
  ordinal: number,
  cssDir: string,
  client: RequestClient,
): Promise<string> {
  const res = await fetchText(cssUrl, client);
  const file = path.join(cssDir, cssFilenameFor(cssUrl, ordinal));
  await writeTextFile(file, res.body);
  return file;
}
