import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ensureDir, safeFilename, writeTextFile } from "../src/utils/filesystem.js";

describe("safeFilename", () => {
  it("replaces each run of unsafe characters with one underscore", () => {
    expect(safeFilename("my style!!.css")).toBe("my_style_.css");
    expect(safeFilename("héllo wörld.css")).toBe("h_llo_w_rld.css");
  });

  it("trims surrounding whitespace first", () => {
    expect(safeFilename("  padded.css  ")).toBe("padded.css");
  });

  it("uses the fallback for empty results", () => {
    expect(safeFilename("")).toBe("file");
    expect(safeFilename("   ")).toBe("file");
    expect(safeFilename("", "index")).toBe("index");
  });

  it("only produces safe characters and never an empty name", () => {
    const inputs = ["***", "a/b\\c", "../../etc/passwd", "tab\there", "emoji 🎨.css", "ok-name_1.css"];
    for (const input of inputs) {
      const name = safeFilename(input);
      expect(name).toMatch(/^[A-Za-z0-9_.-]+$/);
    }
    expect(safeFilename("***")).toBe("_");
    expect(safeFilename("ok-name_1.css")).toBe("ok-name_1.css");
  });
});

describe("ensureDir / writeTextFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "css-mirror-fs-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates nested directories and tolerates existing ones", async () => {
    const nested = join(dir, "a", "b", "c");
    await ensureDir(nested);
    await ensureDir(nested);
    expect((await stat(nested)).isDirectory()).toBe(true);
  });

  it("overwrites existing files", async () => {
    const file = join(dir, "assets", "css", "site.css");
    await writeTextFile(file, "body{color:red}");
    await writeTextFile(file, "body{color:blue}");
    expect(await readFile(file, "utf8")).toBe("body{color:blue}");
  });
});
