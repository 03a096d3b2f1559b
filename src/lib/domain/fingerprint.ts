import { createHash } from "crypto";

/**
 * Derive a stable listing id from a details URL:
 * - the `adv` or `id` query parameter, when present
 * - else the last run of 5+ digits in the last path segment
 * - else the lower-cased path without a trailing slash
 */
export function listingIdFromUrl(detailsUrl: string): string {
  let url: URL;
  try {
    url = new URL(detailsUrl);
  } catch {
    return detailsUrl.trim().toLowerCase().replace(/\/+$/, "");
  }

  const param = url.searchParams.get("adv") ?? url.searchParams.get("id");
  if (param && param.trim().length > 0) return param.trim().toLowerCase();

  const path = url.pathname.replace(/\/+$/, "");
  const lastSegment = path.slice(path.lastIndexOf("/") + 1);
  const digitRuns = lastSegment.match(/\d{5,}/g);
  if (digitRuns) return digitRuns[digitRuns.length - 1];

  return path.toLowerCase();
}

export interface FingerprintInput {
  site: string;
  city: string;
  neighborhood: string;
  propertyType: string;
  price: number | null;
  area: number | null;
  detailsUrl: string;
}

function formatAmount(value: number | null): string {
  return value === null ? "" : value.toFixed(2);
}

/** The pipe-joined tuple that gets hashed. */
export function fingerprintKey(input: FingerprintInput): string {
  return [
    input.site,
    input.city,
    input.neighborhood,
    input.propertyType,
    formatAmount(input.price),
    formatAmount(input.area),
    listingIdFromUrl(input.detailsUrl),
  ].join("|");
}

/**
 * SHA-256 fingerprint over the canonical listing fields. Stable across runs;
 * changes when any field of the tuple changes.
 */
export function computeFingerprint(input: FingerprintInput): string {
  return createHash("sha256").update(fingerprintKey(input), "utf8").digest("hex");
}
