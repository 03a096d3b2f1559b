/**
 * Command orchestration: runs the parsed CLI command over its sites, logs
 * the run summary and decides the exit code. Failures notify by email.
 */
import * as path from "path";
import { UsageError, type CliArgs } from "../cli";
import { getAdapter } from "../adapters";
import type { SiteName } from "../adapters/SourceAdapter";
import type { PageFetcher } from "../http/pageFetcher";
import type { Notifier } from "../notify/mailtrap";
import { writeProcessedCsv } from "../storage/csv";
import { processedPathFor } from "../storage/paths";
import { dedupeByFingerprint } from "./dedupe";
import { collectPages, downloadSite } from "./download";
import { processFile, processUnprocessed, processedOutputPath, reprocess } from "./process";
import { createSummary, formatSummary, logSummaries, type SiteRunSummary } from "./summary";
import type { Transformer } from "./transform";
import { isoTimestamp, runTimestamp, systemClock, type Clock } from "@/lib/clock";
import { getSiteSearchConfig, loadUrlConfigFile, type UrlConfigFile } from "@/lib/config";
import type { ListingData } from "@/lib/domain/types";
import { ConfigError, FatalError, errorMessage } from "@/lib/errors";

export interface RunContext {
  args: CliArgs;
  resultsDir: string;
  /** url_configs.json to read for download and scrape */
  configPath: string;
  fetcher: PageFetcher;
  transformer: Transformer;
  notifier: Notifier;
  clock?: Clock;
}

export interface RunOutcome {
  exitCode: number;
  summaries: SiteRunSummary[];
}

const COMPACT_COLUMNS = [
  "price",
  "originalCurrency",
  "city",
  "neighborhood",
  "propertyType",
  "area",
  "floor",
  "detailsUrl",
] as const;

/**
 * Run one site through download and/or process. ConfigError disables the
 * site; any other failure aborts it and is recorded as fatal.
 */
export async function runSite(
  ctx: RunContext,
  site: SiteName,
  urlConfigs: UrlConfigFile | null
): Promise<SiteRunSummary> {
  const { args, resultsDir, fetcher, transformer, clock = systemClock } = ctx;
  const summary = createSummary(site);
  const shouldDownload = args.command === "download" || args.command === "scrape";
  const shouldProcess = args.command === "process" || args.command === "scrape";

  try {
    let downloaded: string[] = [];
    if (shouldDownload && urlConfigs !== null) {
      const searchConfig = getSiteSearchConfig(urlConfigs, site);
      const result = await downloadSite(getAdapter(site), searchConfig, {
        resultsDir,
        fetcher,
        pageLimit: args.pages,
        clock,
        summary,
      });
      downloaded = result.files;
    }
    if (shouldProcess) {
      const opts = { resultsDir, transformer, summary };
      if (args.file) {
        processFile(site, args.file, processedOutputPath(resultsDir, site, args.file), opts);
      } else {
        // A same-day rerun rewrites the raw file, so its processed copy is stale.
        for (const rawPath of downloaded) {
          processFile(site, rawPath, processedPathFor(resultsDir, site, rawPath), opts);
        }
        processUnprocessed(site, opts);
      }
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      console.warn(`[worker] ${site} disabled: ${err.message}`);
    } else if (err instanceof FatalError) {
      summary.fatal = err.message;
      console.error(`[worker] ${site} aborted: ${err.message}`);
    } else {
      summary.fatal = errorMessage(err);
      console.error(`[worker] ${site} failed:`, err);
    }
  }
  return summary;
}

/** download, process and scrape over every requested site, one after another. */
export async function runSites(ctx: RunContext): Promise<SiteRunSummary[]> {
  const { args } = ctx;
  let urlConfigs: UrlConfigFile | null = null;
  if (args.command !== "process") {
    try {
      urlConfigs = loadUrlConfigFile(ctx.configPath);
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      console.error(`[worker] ${err.message}`);
      return args.sites.map((site) => ({ ...createSummary(site), fatal: err.message }));
    }
  }

  const summaries: SiteRunSummary[] = [];
  for (const site of args.sites) {
    console.log(`\n--- ${site} ---`);
    summaries.push(await runSite(ctx, site, urlConfigs));
  }
  return summaries;
}

export function runReprocess(ctx: RunContext): SiteRunSummary[] {
  const { args, resultsDir, transformer, clock = systemClock } = ctx;
  const site = args.sites[0];
  const summary = createSummary(site);
  if (!args.reprocessTarget) throw new UsageError("reprocess needs a target");
  try {
    reprocess(site, args.reprocessTarget, {
      resultsDir,
      transformer,
      output: args.reprocessOutput,
      clock,
      summary,
    });
  } catch (err) {
    if (!(err instanceof FatalError)) throw err;
    summary.fatal = err.message;
  }
  return [summary];
}

function compactRow(listing: ListingData): Record<string, unknown> {
  return Object.fromEntries(COMPACT_COLUMNS.map((column) => [column, listing[column]]));
}

/** Debug mode: paginate one URL, transform and print. */
export async function runFetch(ctx: RunContext): Promise<SiteRunSummary[]> {
  const { args, resultsDir, fetcher, transformer, clock = systemClock } = ctx;
  const site = args.sites[0];
  const url = args.url;
  if (!url) throw new UsageError("fetch needs --url");
  const summary = createSummary(site);
  summary.urlsAttempted = 1;

  const result = await collectPages(
    getAdapter(site),
    { url, name: "fetch", folder: "fetch" },
    fetcher,
    { pageLimit: args.pages, scrapedAt: isoTimestamp(clock) }
  );
  if (result.failed) summary.urlsFailed = 1;
  summary.pages = result.pages;
  summary.fetched = result.listings.length;

  const batch = transformer.transformBatch(result.listings);
  const { kept, duplicates } = dedupeByFingerprint(batch.listings);
  summary.transformed = batch.listings.length;
  summary.dropped = batch.dropped;
  summary.duplicates = duplicates;

  console.log(`\nFetched ${kept.length} listings from ${site}:\n`);
  console.table(args.full ? kept : kept.map(compactRow));

  if (args.save) {
    const outPath =
      args.outputPath ?? path.join(resultsDir, `fetch_${site}_${runTimestamp(clock)}.csv`);
    try {
      writeProcessedCsv(outPath, kept, site);
      summary.filesWritten = 1;
      console.log(`\nSaved to: ${outPath}`);
    } catch (err) {
      if (!(err instanceof FatalError)) throw err;
      summary.fatal = err.message;
    }
  }
  if (result.failed && kept.length === 0 && summary.fatal === null) {
    summary.fatal = `No listings fetched from ${url}`;
  }
  return [summary];
}

/**
 * Run the command, log unknown values and the summary, and email when any
 * site failed. Exit code 1 when a site is fatal.
 */
export async function runCommand(ctx: RunContext): Promise<RunOutcome> {
  const { args } = ctx;
  console.log(`=== imotscope ${args.command}: ${args.sites.join(", ")} ===`);

  let summaries: SiteRunSummary[];
  if (args.command === "reprocess") {
    summaries = runReprocess(ctx);
  } else if (args.command === "fetch") {
    summaries = await runFetch(ctx);
  } else {
    summaries = await runSites(ctx);
  }

  ctx.transformer.unknowns.log();
  logSummaries(summaries);

  const failed = summaries.filter((s) => s.fatal !== null);
  if (failed.length === 0) return { exitCode: 0, summaries };

  await ctx.notifier.notify(
    `imotscope ${args.command}: ${failed.length} site(s) failed`,
    failed.map(formatSummary).join("\n")
  );
  return { exitCode: 1, summaries };
}
