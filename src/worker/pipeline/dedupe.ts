import type { ListingData } from "@/lib/domain/types";

export interface DedupeResult {
  kept: ListingData[];
  /** Rows collapsed into an earlier one */
  duplicates: number;
}

/**
 * Collapse rows with identical fingerprint hashes, keeping the first one in
 * input order. Callers order their input so that "first" means earliest.
 */
export function dedupeByFingerprint(listings: Iterable<ListingData>): DedupeResult {
  const seen = new Set<string>();
  const kept: ListingData[] = [];
  let duplicates = 0;
  for (const listing of listings) {
    if (seen.has(listing.fingerprintHash)) {
      duplicates++;
      continue;
    }
    seen.add(listing.fingerprintHash);
    kept.push(listing);
  }
  return { kept, duplicates };
}
