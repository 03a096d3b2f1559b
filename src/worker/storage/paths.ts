import * as fs from "fs";
import * as path from "path";

/**
 * Results layout:
 *   {root}/raw/{site}/{folder}/{date}.csv
 *   {root}/raw_html/{site}/{folder}/{date}.{html|json}.gz
 *   {root}/processed/{site}/{folder}/{date}.csv
 */

export function rawSiteDir(resultsDir: string, site: string): string {
  return path.join(resultsDir, "raw", site);
}

export function processedSiteDir(resultsDir: string, site: string): string {
  return path.join(resultsDir, "processed", site);
}

export function rawFilePath(resultsDir: string, site: string, folder: string, date: string): string {
  return path.join(rawSiteDir(resultsDir, site), folder, `${date}.csv`);
}

export function snapshotPath(
  resultsDir: string,
  site: string,
  folder: string,
  date: string,
  kind: "html" | "json"
): string {
  return path.join(resultsDir, "raw_html", site, folder, `${date}.${kind}.gz`);
}

/** The processed counterpart of a raw file: same path relative to the site root. */
export function processedPathFor(resultsDir: string, site: string, rawPath: string): string {
  const relative = path.relative(rawSiteDir(resultsDir, site), rawPath);
  return path.join(processedSiteDir(resultsDir, site), relative);
}

/** `{stem}_reprocessed_{timestamp}.csv` beside the given file. */
export function reprocessedPathFor(processedPath: string, timestamp: string): string {
  const { dir, name } = path.parse(processedPath);
  return path.join(dir, `${name}_reprocessed_${timestamp}.csv`);
}

function walkCsv(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...walkCsv(full));
    } else if (entry.isFile() && entry.name.endsWith(".csv")) {
      files.push(full);
    }
  }
  return files;
}

/**
 * Raw CSVs of a site (or one of its folders), in ascending path order.
 * Dated file names make that chronological within a folder.
 */
export function listRawFiles(resultsDir: string, site: string, folder?: string): string[] {
  const root = rawSiteDir(resultsDir, site);
  return walkCsv(folder ? path.join(root, folder) : root).sort();
}
