#!/usr/bin/env node
/**
 * css-mirror
 *
 * A TypeScript CLI to mirror a single web page (HTML + linked CSS) to a local folder.
 * - Fetches the page with browser-like headers, following redirects
 * - Downloads every <link rel="stylesheet"> to assets/css/
 * - Rewrites the links to the local copies and saves the page as index.html
 * - Stylesheets that fail to download keep their original href
 *
 * Usage:
 *   npm run dev -- <url> [--out site_dump] [--timeout 20] [--maxBytes 10485760]
 *     [--userAgent <string>]
 *
 * Output:
 *   <out>/index.html
 *   <out>/assets/css/*.css
 */

import { runCLI } from "./cli.js";

runCLI()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
