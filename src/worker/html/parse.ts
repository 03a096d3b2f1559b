import { load, type Cheerio, type CheerioAPI } from "cheerio";
import type { AnyNode } from "domhandler";

export type { CheerioAPI };

/** Parse a decoded page body. */
export function loadHtml(html: string): CheerioAPI {
  return load(html);
}

/** Collapse runs of whitespace (including NBSP) into single spaces. */
export function cleanText(str: string): string {
  return str.replace(/\s+/g, " ").trim();
}

/**
 * Extract cleaned text content of the first match within `scope`.
 * Returns null if not found or empty.
 */
export function parseText<T extends AnyNode>(scope: Cheerio<T>, selector: string): string | null {
  const text = cleanText(scope.find(selector).first().text());
  return text.length > 0 ? text : null;
}

/**
 * Extract all cleaned text contents within `scope`.
 */
export function parseAllText<T extends AnyNode>(scope: Cheerio<T>, selector: string): string[] {
  const results: string[] = [];
  const matches = scope.find(selector);
  for (let i = 0; i < matches.length; i++) {
    const text = cleanText(matches.eq(i).text());
    if (text.length > 0) results.push(text);
  }
  return results;
}

/**
 * Extract attribute value from first matching element.
 */
export function parseAttr<T extends AnyNode>(
  scope: Cheerio<T>,
  selector: string,
  attr: string
): string | null {
  const val = scope.find(selector).first().attr(attr);
  return val && val.trim().length > 0 ? val.trim() : null;
}

/**
 * Like parseText, but child nodes are joined with spaces so `<br>`-separated
 * parts stay apart.
 */
export function parseSpacedText<T extends AnyNode>(
  scope: Cheerio<T>,
  selector: string
): string | null {
  const contents = scope.find(selector).first().contents();
  const parts: string[] = [];
  for (let i = 0; i < contents.length; i++) {
    parts.push(contents.eq(i).text());
  }
  const text = cleanText(parts.join(" "));
  return text.length > 0 ? text : null;
}

/**
 * Parse an integer from text like "1 234" or "12 снимки". Returns null if unparseable.
 */
export function parseNumber(str: string | null | undefined): number | null {
  if (!str) return null;
  const match = str.replace(/\s/g, "").match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}

/**
 * Resolve a possibly relative href against the site base URL.
 * Returns null for empty or unresolvable links.
 */
export function resolveUrl(href: string | null | undefined, baseUrl: string): string | null {
  if (!href || href.trim().length === 0) return null;
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return null;
  }
}
