/**
 * HTML stylesheet link extraction and rewriting
 */

import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export interface StylesheetLink {
  /** 1-based position among all stylesheet links of the document */
  ordinal: number;
  rel: string;
  node: Cheerio<Element>;
}

/**
 * Parse HTML into a mutable document. Never throws on malformed markup.
 */
export function parseDocument(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Every <link> whose rel mentions "stylesheet", in document order.
 * Matches as a substring, so "alternate stylesheet" and "STYLESHEET" count too.
 */
export function findStylesheetLinks($: CheerioAPI): StylesheetLink[] {
  const links: StylesheetLink[] = [];
  $("link[rel]").each((_, el) => {
    const rel = $(el).attr("rel") ?? "";
    if (!rel.toLowerCase().includes("stylesheet")) return;
    links.push({ ordinal: links.length + 1, rel, node: $(el) });
  });
  return links;
}

export function getHref(link: StylesheetLink): string | undefined {
  return link.node.attr("href");
}

export function setHref(link: StylesheetLink, href: string): void {
  link.node.attr("href", href);
}

/**
 * Render the document, including every href rewritten so far
 */
export function serializeDocument($: CheerioAPI): string {
  return $.html();
}
