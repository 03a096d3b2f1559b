import { loadHtml, type CheerioAPI } from "../html/parse";
import type { PageEncoding } from "../http/fetchWithPolicy";
import type { SearchUrl, SiteSearchConfig } from "@/lib/config";
import type { LocationFormat } from "@/lib/domain/location";
import type { RawListing } from "@/lib/domain/types";
import { ConfigError, ExtractionError } from "@/lib/errors";

export const SITE_NAMES = [
  "ImotBg",
  "ImotiNet",
  "HomesBg",
  "Suprimmo",
  "AloBg",
  "BazarBg",
  "ImotiCom",
  "BulgarianProperties",
  "Luximmo",
] as const;
export type SiteName = (typeof SITE_NAMES)[number];

export function isSiteName(value: string): value is SiteName {
  return SITE_NAMES.some((name) => name === value);
}

export type SourceType = "html" | "json";

/** Static description of a source site. */
export interface SiteConfig {
  name: SiteName;
  baseUrl: string;
  encoding: PageEncoding;
  sourceType: SourceType;
  /** Minimum delay between requests to this site */
  rateLimitMs: number;
  /** Hard page ceiling per search URL */
  maxPages: number;
  locationFormat: LocationFormat;
}

/** One search to paginate, with the folder its results are written to. */
export interface SearchTarget {
  url: string;
  name: string;
  folder: string;
}

/** Values stamped on every record extracted from one page. */
export interface PageContext {
  /** The search URL whose pagination produced the page */
  searchUrl: string;
  /** ISO-8601 timestamp of the extraction pass */
  scrapedAt: string;
}

/** A fetched and parsed document. */
export interface SitePage {
  /** Lazy and restartable: each call walks the document from the start. */
  extractListings(): Iterable<RawListing>;
  /** `pageNumber` is the number of the page that would be fetched next. */
  getNextPageUrl(currentUrl: string, pageNumber: number): string | null;
}

/**
 * Interface that every listing source must implement.
 * An adapter knows how to build its search URLs and how to read its pages;
 * it never performs network I/O.
 */
export interface SourceAdapter {
  name: SiteName;
  config: SiteConfig;

  /** Ordered, deterministic search targets from the site's search config */
  buildUrls(searchConfig: SiteSearchConfig): SearchTarget[];

  /** Parse fetched content. JSON sites raise ExtractionError on malformed bodies. */
  loadPage(content: string, ctx: PageContext): SitePage;
}

// ==================== SEARCH TARGETS ====================

const CYRILLIC_TO_LATIN: Record<string, string> = {
  а: "a", б: "b", в: "v", г: "g", д: "d", е: "e", ж: "zh", з: "z", и: "i",
  й: "y", к: "k", л: "l", м: "m", н: "n", о: "o", п: "p", р: "r", с: "s",
  т: "t", у: "u", ф: "f", х: "h", ц: "ts", ч: "ch", ш: "sh", щ: "sht",
  ъ: "a", ь: "y", ю: "yu", я: "ya",
};

/** Folder-safe slug: transliterated, lower-case, dash-separated. */
export function slugify(name: string): string {
  const latin = [...name.toLowerCase()].map((ch) => CYRILLIC_TO_LATIN[ch] ?? ch).join("");
  const slug = latin.replace(/[^a-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
  return slug.length > 0 ? slug : "search";
}

/** Suffix repeated folders with -2, -3, ... so every target has its own. */
export function uniqueFolders<T extends { folder: string }>(targets: T[]): T[] {
  const seen = new Map<string, number>();
  return targets.map((target) => {
    const count = (seen.get(target.folder) ?? 0) + 1;
    seen.set(target.folder, count);
    return count === 1 ? target : { ...target, folder: `${target.folder}-${count}` };
  });
}

/** One target per configured search URL, named `search-N` when unnamed. */
export function targetsFromUrls(urls: SearchUrl[]): SearchTarget[] {
  return urls.map((entry, i) => {
    const name = entry.name ?? `search-${i + 1}`;
    return { url: entry.url, name, folder: entry.folder ?? slugify(name) };
  });
}

/**
 * Default URL builder: one target per configured search URL.
 * A config without `urls` has no filter at all and is rejected; an empty
 * list is valid and yields no targets.
 */
export function buildUrlsFromList(site: SiteName, searchConfig: SiteSearchConfig): SearchTarget[] {
  if (searchConfig.urls === undefined) {
    throw new ConfigError(`${site}: config has no "urls"`, { site });
  }
  return uniqueFolders(targetsFromUrls(searchConfig.urls));
}

// ==================== ADAPTER FACTORIES ====================

export interface HtmlAdapterDefinition {
  config: SiteConfig;
  buildUrls?: (searchConfig: SiteSearchConfig) => SearchTarget[];
  extractListings: ($: CheerioAPI, ctx: PageContext) => Iterable<RawListing>;
  getNextPageUrl: ($: CheerioAPI, currentUrl: string, pageNumber: number) => string | null;
}

export function createHtmlAdapter(definition: HtmlAdapterDefinition): SourceAdapter {
  const { config } = definition;
  return {
    name: config.name,
    config,
    buildUrls: definition.buildUrls ?? ((searchConfig) => buildUrlsFromList(config.name, searchConfig)),
    loadPage(content, ctx) {
      const $ = loadHtml(content);
      return {
        extractListings: () => definition.extractListings($, ctx),
        getNextPageUrl: (currentUrl, pageNumber) =>
          definition.getNextPageUrl($, currentUrl, pageNumber),
      };
    },
  };
}

export interface JsonAdapterDefinition<T> {
  config: SiteConfig;
  buildUrls?: (searchConfig: SiteSearchConfig) => SearchTarget[];
  /** Validate the decoded body; throw ExtractionError when it is not recognized */
  parse: (json: unknown) => T;
  extractListings: (data: T, ctx: PageContext) => Iterable<RawListing>;
  getNextPageUrl: (data: T, currentUrl: string, pageNumber: number) => string | null;
}

export function createJsonAdapter<T>(definition: JsonAdapterDefinition<T>): SourceAdapter {
  const { config } = definition;
  return {
    name: config.name,
    config,
    buildUrls: definition.buildUrls ?? ((searchConfig) => buildUrlsFromList(config.name, searchConfig)),
    loadPage(content, ctx) {
      let json: unknown;
      try {
        json = JSON.parse(content);
      } catch (err) {
        throw new ExtractionError(`${config.name}: response is not JSON`, {
          site: config.name,
          url: ctx.searchUrl,
          cause: err,
        });
      }
      const data = definition.parse(json);
      return {
        extractListings: () => definition.extractListings(data, ctx),
        getNextPageUrl: (currentUrl, pageNumber) =>
          definition.getNextPageUrl(data, currentUrl, pageNumber),
      };
    },
  };
}
