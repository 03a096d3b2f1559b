/**
 * Downloader: paginate each search target of a site, extract raw listings
 * and write them to results/raw/{site}/{folder}/{date}.csv.
 */
import type { SearchTarget, SourceAdapter } from "../adapters/SourceAdapter";
import type { PageFetcher } from "../http/pageFetcher";
import { rawFilePath, snapshotPath } from "../storage/paths";
import { writeRawCsv, writeSnapshot } from "../storage/csv";
import { createSummary, type SiteRunSummary } from "./summary";
import { isoTimestamp, runDate, systemClock, type Clock } from "@/lib/clock";
import type { SiteSearchConfig } from "@/lib/config";
import type { RawListing } from "@/lib/domain/types";
import { ExtractionError, FetchError } from "@/lib/errors";

/** Separator between documents in a fallback snapshot. */
export const PAGE_BREAK = "\n<!-- PAGE BREAK -->\n";

export interface CollectOptions {
  /** Extra page cap on top of the site's maxPages */
  pageLimit?: number;
  /** Timestamp stamped on every record */
  scrapedAt: string;
}

export interface CollectResult {
  listings: RawListing[];
  /** Bodies of every fetched page, in order */
  documents: string[];
  pages: number;
  /** True when a fetch or extraction error cut the pagination short */
  failed: boolean;
}

/**
 * Walk one search target page by page. Stops when the site reports no next
 * page or when min(maxPages, pageLimit) pages were fetched. FetchError and
 * ExtractionError stop the target but keep what was collected before.
 */
export async function collectPages(
  adapter: SourceAdapter,
  target: SearchTarget,
  fetcher: PageFetcher,
  opts: CollectOptions
): Promise<CollectResult> {
  const { config } = adapter;
  const ceiling = Math.min(config.maxPages, opts.pageLimit ?? config.maxPages);
  const listings: RawListing[] = [];
  const documents: string[] = [];
  let failed = false;
  let pageNumber = 1;
  let url: string | null = target.url;

  while (url !== null && pageNumber <= ceiling) {
    let content: string;
    try {
      content = await fetcher.fetch(url, {
        encoding: config.encoding,
        rateLimitMs: config.rateLimitMs,
        rateLimitKey: config.name,
      });
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      console.error(`[downloader] ${config.name}: giving up on ${url}: ${err.message}`);
      failed = true;
      break;
    }
    documents.push(content);

    let pageListings: RawListing[];
    let nextUrl: string | null;
    try {
      const page = adapter.loadPage(content, { searchUrl: target.url, scrapedAt: opts.scrapedAt });
      pageListings = [...page.extractListings()];
      nextUrl = pageNumber < ceiling ? page.getNextPageUrl(url, pageNumber + 1) : null;
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      console.error(`[downloader] ${config.name}: page ${pageNumber} of ${target.name} unreadable: ${err.message}`);
      failed = true;
      break;
    }

    listings.push(...pageListings);
    console.log(`[downloader] ${config.name}: ${target.name} page ${pageNumber}: ${pageListings.length} listings`);
    pageNumber++;
    url = nextUrl;
  }

  return { listings, documents, pages: documents.length, failed };
}

export interface DownloadOptions {
  resultsDir: string;
  fetcher: PageFetcher;
  pageLimit?: number;
  clock?: Clock;
  /** Counters to add to; a fresh summary when omitted */
  summary?: SiteRunSummary;
}

export interface DownloadResult {
  summary: SiteRunSummary;
  /** Raw CSVs written, in target order */
  files: string[];
}

/**
 * Download every search target of one site. Throws ConfigError for a bad
 * search config and FatalError when output cannot be written.
 */
export async function downloadSite(
  adapter: SourceAdapter,
  searchConfig: SiteSearchConfig,
  opts: DownloadOptions
): Promise<DownloadResult> {
  const { resultsDir, fetcher, pageLimit, clock = systemClock } = opts;
  const site = adapter.name;
  const summary = opts.summary ?? createSummary(site);
  const date = runDate(clock);
  const scrapedAt = isoTimestamp(clock);
  const files: string[] = [];

  const targets = adapter.buildUrls(searchConfig);
  console.log(`[downloader] ${site}: ${targets.length} search URLs`);

  for (const target of targets) {
    summary.urlsAttempted++;
    const result = await collectPages(adapter, target, fetcher, { pageLimit, scrapedAt });
    if (result.failed) summary.urlsFailed++;
    summary.pages += result.pages;
    summary.fetched += result.listings.length;

    if (result.listings.length > 0) {
      const filePath = rawFilePath(resultsDir, site, target.folder, date);
      writeRawCsv(filePath, result.listings, site);
      summary.filesWritten++;
      files.push(filePath);
      console.log(`[downloader] ${site}: wrote ${result.listings.length} listings to ${filePath}`);
    } else if (result.documents.length > 0) {
      const filePath = snapshotPath(resultsDir, site, target.folder, date, adapter.config.sourceType);
      writeSnapshot(filePath, result.documents.join(PAGE_BREAK), site);
      console.warn(`[downloader] ${site}: no listings for ${target.name}, saved pages to ${filePath}`);
    } else {
      console.warn(`[downloader] ${site}: nothing fetched for ${target.name}`);
    }
  }

  return { summary, files };
}
