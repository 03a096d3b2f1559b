/**
 * Processor: turn stored raw CSVs into normalized, deduplicated CSVs under
 * results/processed. Never touches the network.
 */
import * as fs from "fs";
import * as path from "path";
import { readRawCsv, writeProcessedCsv } from "../storage/csv";
import {
  listRawFiles,
  processedPathFor,
  processedSiteDir,
  rawSiteDir,
  reprocessedPathFor,
} from "../storage/paths";
import { dedupeByFingerprint } from "./dedupe";
import { createSummary, type SiteRunSummary } from "./summary";
import type { Transformer } from "./transform";
import { runTimestamp, systemClock, type Clock } from "@/lib/clock";
import type { ListingData, RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

export interface ProcessOptions {
  resultsDir: string;
  transformer: Transformer;
  /** Counters to add to; a fresh summary when omitted */
  summary?: SiteRunSummary;
}

export type ReprocessOutput = "overwrite" | "new" | "merge";
export const REPROCESS_OUTPUTS: readonly ReprocessOutput[] = ["overwrite", "new", "merge"];

export type ReprocessTarget =
  | { kind: "file"; path: string }
  | { kind: "folder"; folder: string }
  | { kind: "all" };

export interface ReprocessOptions extends ProcessOptions {
  output: ReprocessOutput;
  clock?: Clock;
}

export interface ProcessResult {
  summary: SiteRunSummary;
  /** Processed CSVs written */
  files: string[];
}

/**
 * Where a raw file's processed output goes: the mirrored path, or the site's
 * processed root when the file lives outside results/raw/{site}.
 */
export function processedOutputPath(resultsDir: string, site: string, rawPath: string): string {
  const relative = path.relative(rawSiteDir(resultsDir, site), rawPath);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    return path.join(processedSiteDir(resultsDir, site), path.basename(rawPath));
  }
  return processedPathFor(resultsDir, site, rawPath);
}

function transformAndDedupe(
  files: string[],
  transformer: Transformer,
  summary: SiteRunSummary
): { listings: ListingData[]; readable: number } {
  const listings: ListingData[] = [];
  let readable = 0;
  for (const file of files) {
    let raws: RawListing[];
    try {
      raws = readRawCsv(file);
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      console.error(`[processor] Skipping ${file}: ${err.message}`);
      continue;
    }
    readable++;
    const batch = transformer.transformBatch(raws);
    summary.transformed += batch.listings.length;
    summary.dropped += batch.dropped;
    listings.push(...batch.listings);
  }
  const { kept, duplicates } = dedupeByFingerprint(listings);
  summary.duplicates += duplicates;
  return { listings: kept, readable };
}

function writeListings(
  outPath: string,
  listings: ListingData[],
  site: string,
  summary: SiteRunSummary
): void {
  writeProcessedCsv(outPath, listings, site);
  summary.filesWritten++;
  console.log(`[processor] ${site}: wrote ${listings.length} listings to ${outPath}`);
}

/** Transform one raw file into `outPath`. */
export function processFile(
  site: string,
  rawPath: string,
  outPath: string,
  opts: ProcessOptions
): ProcessResult {
  const summary = opts.summary ?? createSummary(site);
  const { listings, readable } = transformAndDedupe([rawPath], opts.transformer, summary);
  if (readable === 0) return { summary, files: [] };
  writeListings(outPath, listings, site, summary);
  return { summary, files: [outPath] };
}

/** Process every raw file of the site that has no processed counterpart yet. */
export function processUnprocessed(site: string, opts: ProcessOptions): ProcessResult {
  const summary = opts.summary ?? createSummary(site);
  const files: string[] = [];
  const pending = listRawFiles(opts.resultsDir, site).filter(
    (rawPath) => !fs.existsSync(processedPathFor(opts.resultsDir, site, rawPath))
  );
  console.log(`[processor] ${site}: ${pending.length} unprocessed raw files`);

  for (const rawPath of pending) {
    const outPath = processedPathFor(opts.resultsDir, site, rawPath);
    files.push(...processFile(site, rawPath, outPath, { ...opts, summary }).files);
  }
  return { summary, files };
}

function targetFiles(resultsDir: string, site: string, target: ReprocessTarget): string[] {
  switch (target.kind) {
    case "file":
      return [target.path];
    case "folder":
      return listRawFiles(resultsDir, site, target.folder);
    case "all":
      return listRawFiles(resultsDir, site);
  }
}

function mergeDir(resultsDir: string, site: string, target: ReprocessTarget): string {
  switch (target.kind) {
    case "file":
      return path.dirname(processedOutputPath(resultsDir, site, target.path));
    case "folder":
      return path.join(processedSiteDir(resultsDir, site), target.folder);
    case "all":
      return processedSiteDir(resultsDir, site);
  }
}

/**
 * Re-run the transformer over stored raw files.
 * - overwrite: each file's processed path is rewritten
 * - new: `{stem}_reprocessed_{timestamp}.csv` beside it
 * - merge: one `merged_{timestamp}.csv` deduplicated across all inputs,
 *   read in ascending path order so the earliest row wins
 */
export function reprocess(site: string, target: ReprocessTarget, opts: ReprocessOptions): ProcessResult {
  const { resultsDir, output, clock = systemClock } = opts;
  const summary = opts.summary ?? createSummary(site);
  const inputs = targetFiles(resultsDir, site, target);
  const timestamp = runTimestamp(clock);

  if (inputs.length === 0) {
    console.warn(`[processor] ${site}: no raw files to reprocess`);
    return { summary, files: [] };
  }
  console.log(`[processor] ${site}: reprocessing ${inputs.length} files (${output})`);

  if (output === "merge") {
    const outPath = path.join(mergeDir(resultsDir, site, target), `merged_${timestamp}.csv`);
    const { listings, readable } = transformAndDedupe(inputs, opts.transformer, summary);
    if (readable === 0) return { summary, files: [] };
    writeListings(outPath, listings, site, summary);
    return { summary, files: [outPath] };
  }

  const files: string[] = [];
  for (const rawPath of inputs) {
    const processedPath = processedOutputPath(resultsDir, site, rawPath);
    const outPath = output === "new" ? reprocessedPathFor(processedPath, timestamp) : processedPath;
    files.push(...processFile(site, rawPath, outPath, { ...opts, summary }).files);
  }
  return { summary, files };
}
