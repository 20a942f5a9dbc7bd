/**
 * cheerio helpers shared by the listing and detail extractors
 */

import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";

export type Doc = cheerio.CheerioAPI;
export type Nodes = cheerio.Cheerio<AnyNode>;

export function loadHtml(html: string): Doc {
  return cheerio.load(html);
}

/**
 * Collapse runs of whitespace and trim
 */
export function cleanText(text: string | undefined): string {
  return text ? text.replace(/\s+/g, " ").trim() : "";
}

/**
 * Cleaned text of the first match ("" when nothing matches)
 */
export function firstText(scope: Nodes, selector: string): string {
  return cleanText(scope.find(selector).first().text());
}

/**
 * Trimmed attribute of the first match (undefined when missing or blank)
 */
export function firstAttr(
  scope: Nodes,
  selector: string,
  attribute: string,
): string | undefined {
  const value = scope.find(selector).first().attr(attribute)?.trim();
  return value || undefined;
}

/**
 * Cleaned text of the first document-wide match
 */
export function selectText($: Doc, selector: string): string {
  return cleanText($(selector).first().text());
}

/**
 * Whole-document text, whitespace collapsed
 */
export function documentText($: Doc): string {
  return cleanText($.root().text());
}

/**
 * Resolve an href against the panel base URL ("" when unresolvable)
 */
export function resolveUrl(href: string | undefined, baseUrl: string): string {
  if (!href) {
    return "";
  }
  try {
    return new URL(href, `${baseUrl.replace(/\/+$/, "")}/`).toString();
  } catch {
    return "";
  }
}
