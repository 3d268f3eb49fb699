/**
 * Filesystem utility functions
 */

import fs from "node:fs/promises";
import path from "node:path";

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Write a UTF-8 text file, creating its directory first. Overwrites.
 */
export async function writeTextFile(file: string, contents: string): Promise<void> {
  await ensureDir(path.dirname(file));
  await fs.writeFile(file, contents, "utf8");
}

/**
 * Convert a string to a safe filename.
 * Each run of characters outside [A-Za-z0-9_.-] becomes a single underscore.
 */
export function safeFilename(s: string, fallback = "file"): string {
  const name = s.trim().replace(/[^a-zA-Z0-9_.-]+/g, "_");
  return name || fallback;
}
