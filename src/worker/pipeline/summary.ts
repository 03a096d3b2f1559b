/** Per-site counters reported at the end of every run. */
export interface SiteRunSummary {
  site: string;
  urlsAttempted: number;
  urlsFailed: number;
  pages: number;
  fetched: number;
  transformed: number;
  dropped: number;
  duplicates: number;
  filesWritten: number;
  /** Set when the site was aborted */
  fatal: string | null;
}

export function createSummary(site: string): SiteRunSummary {
  return {
    site,
    urlsAttempted: 0,
    urlsFailed: 0,
    pages: 0,
    fetched: 0,
    transformed: 0,
    dropped: 0,
    duplicates: 0,
    filesWritten: 0,
    fatal: null,
  };
}

export function formatSummary(s: SiteRunSummary): string {
  const line =
    `${s.site}: urls ${s.urlsAttempted - s.urlsFailed}/${s.urlsAttempted} ok, ` +
    `${s.pages} pages, ${s.fetched} fetched, ${s.transformed} transformed, ` +
    `${s.dropped} dropped, ${s.duplicates} duplicates, ${s.filesWritten} files`;
  return s.fatal ? `${line} - FATAL: ${s.fatal}` : line;
}

export function logSummaries(summaries: SiteRunSummary[]): void {
  console.log("\n=== Run summary ===");
  for (const s of summaries) {
    if (s.fatal) console.error(`[summary] ${formatSummary(s)}`);
    else console.log(`[summary] ${formatSummary(s)}`);
  }
}
