import { describe, expect, it } from "vitest";
import {
  findStylesheetLinks,
  getHref,
  parseDocument,
  serializeDocument,
  setHref,
} from "../src/parsers/stylesheets.js";

const PAGE = `<!DOCTYPE html>
<html><head>
<link rel="stylesheet" href="a.css">
<link rel="icon" href="favicon.ico">
<link rel="Alternate StyleSheet" href="b.css">
<link rel="preload stylesheet">
<link rel="stylesheet-ish" href="c.css">
</head><body><p>Hi</p></body></html>`;

describe("findStylesheetLinks", () => {
  it("matches 'stylesheet' anywhere in rel, case-insensitively, in document order", () => {
    const links = findStylesheetLinks(parseDocument(PAGE));
    expect(links.map((l) => l.rel)).toEqual([
      "stylesheet",
      "Alternate StyleSheet",
      "preload stylesheet",
      "stylesheet-ish",
    ]);
  });

  it("numbers every match, including links without href", () => {
    const links = findStylesheetLinks(parseDocument(PAGE));
    expect(links.map((l) => l.ordinal)).toEqual([1, 2, 3, 4]);
    expect(links.map(getHref)).toEqual(["a.css", "b.css", undefined, "c.css"]);
  });

  it("returns nothing for a page without stylesheets", () => {
    expect(findStylesheetLinks(parseDocument("<p>plain</p>"))).toEqual([]);
  });

  it("tolerates malformed markup", () => {
    const $ = parseDocument("<div><p>unclosed <link rel=stylesheet href=x.css><span>");
    const links = findStylesheetLinks($);
    expect(links).toHaveLength(1);
    expect(getHref(links[0])).toBe("x.css");
  });
});

describe("setHref / serializeDocument", () => {
  it("serializes the rewritten href and leaves other links alone", () => {
    const $ = parseDocument(PAGE);
    const [first] = findStylesheetLinks($);
    setHref(first, "assets/css/a.css");

    const html = serializeDocument($);
    expect(html).toContain('<link rel="stylesheet" href="assets/css/a.css">');
    expect(html).toContain('<link rel="Alternate StyleSheet" href="b.css">');
    expect(html).toContain('<link rel="icon" href="favicon.ico">');
  });

  it("reflects the mutation when the output is parsed again", () => {
    const $ = parseDocument(PAGE);
    for (const link of findStylesheetLinks($)) {
      if (getHref(link)) setHref(link, `assets/css/${link.ordinal}.css`);
    }
    const again = findStylesheetLinks(parseDocument(serializeDocument($)));
    expect(again.map(getHref)).toEqual([
      "assets/css/1.css",
      "assets/css/2.css",
      undefined,
      "assets/css/4.css",
    ]);
  });
});
