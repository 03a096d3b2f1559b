/**
 * CSV persistence for raw and processed listings. UTF-8, comma-delimited,
 * header row; an empty cell is an absent value.
 */
import * as fs from "fs";
import * as path from "path";
import { gzipSync } from "zlib";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { createRawListing, type ListingData, type RawListing } from "@/lib/domain/types";
import { ExtractionError, FatalError, errorMessage } from "@/lib/errors";

export const RAW_COLUMNS = [
  "site",
  "details_url",
  "search_url",
  "price_text",
  "location_text",
  "title",
  "area_text",
  "floor_text",
  "total_floors_text",
  "description",
  "agency_name",
  "num_photos",
  "ref_no",
  "total_offers",
  "scraped_at",
] as const;

export const PROCESSED_COLUMNS = [
  "site",
  "details_url",
  "search_url",
  "price",
  "original_currency",
  "price_per_m2",
  "city",
  "neighborhood",
  "property_type",
  "offer_type",
  "area",
  "floor",
  "total_floors",
  "raw_title",
  "raw_location",
  "agency",
  "num_photos",
  "ref_no",
  "scraped_at",
  "fingerprint_hash",
] as const;

type Cell = string | number | null;

function rawRow(listing: RawListing): Cell[] {
  return [
    listing.site,
    listing.detailsUrl,
    listing.searchUrl,
    listing.priceText,
    listing.locationText,
    listing.title,
    listing.areaText,
    listing.floorText,
    listing.totalFloorsText,
    listing.description,
    listing.agencyName,
    listing.numPhotos,
    listing.refNo,
    listing.totalOffers,
    listing.scrapedAt,
  ];
}

function processedRow(listing: ListingData): Cell[] {
  return [
    listing.site,
    listing.detailsUrl,
    listing.searchUrl,
    listing.price,
    listing.originalCurrency,
    listing.pricePerM2,
    listing.city,
    listing.neighborhood,
    listing.propertyType,
    listing.offerType,
    listing.area,
    listing.floor,
    listing.totalFloors,
    listing.rawTitle,
    listing.rawLocation,
    listing.agency,
    listing.numPhotos,
    listing.refNo,
    listing.scrapedAt,
    listing.fingerprintHash,
  ];
}

export function rawListingsToCsv(listings: readonly RawListing[]): string {
  return stringify(listings.map(rawRow), { header: true, columns: [...RAW_COLUMNS] });
}

export function listingsToCsv(listings: readonly ListingData[]): string {
  return stringify(listings.map(processedRow), { header: true, columns: [...PROCESSED_COLUMNS] });
}

/** Write a file, creating parent directories. Any failure is fatal for the site. */
export function writeOutput(filePath: string, content: string | Buffer, site?: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  } catch (err) {
    throw new FatalError(`Cannot write ${filePath}: ${errorMessage(err)}`, { site, cause: err });
  }
}

export function writeRawCsv(filePath: string, listings: readonly RawListing[], site?: string): void {
  writeOutput(filePath, rawListingsToCsv(listings), site);
}

export function writeProcessedCsv(
  filePath: string,
  listings: readonly ListingData[],
  site?: string
): void {
  writeOutput(filePath, listingsToCsv(listings), site);
}

/** Gzip-compress fetched documents for later inspection. */
export function writeSnapshot(filePath: string, content: string, site?: string): void {
  writeOutput(filePath, gzipSync(Buffer.from(content, "utf-8")), site);
}

// ==================== READING ====================

const RowsSchema = z.array(z.record(z.string()));

function emptyToNull(value: string | undefined): string | null {
  return value === undefined || value === "" ? null : value;
}

function intOrNull(value: string | undefined): number | null {
  const text = emptyToNull(value);
  if (text === null) return null;
  const num = Number(text);
  return Number.isInteger(num) ? num : null;
}

/**
 * Parse raw CSV text. Rows without a site or details URL are kept with empty
 * values so the transformer drops and counts them.
 */
export function parseRawCsv(text: string, source = "<csv>"): RawListing[] {
  let rows: z.infer<typeof RowsSchema>;
  try {
    rows = RowsSchema.parse(parse(text, { columns: true, skip_empty_lines: true, bom: true }));
  } catch (err) {
    throw new ExtractionError(`Unreadable CSV ${source}: ${errorMessage(err)}`, { cause: err });
  }

  return rows.map((row) =>
    createRawListing({
      site: row.site ?? "",
      detailsUrl: row.details_url ?? "",
      searchUrl: emptyToNull(row.search_url),
      priceText: emptyToNull(row.price_text),
      locationText: emptyToNull(row.location_text),
      title: emptyToNull(row.title),
      areaText: emptyToNull(row.area_text),
      floorText: emptyToNull(row.floor_text),
      totalFloorsText: emptyToNull(row.total_floors_text),
      description: emptyToNull(row.description),
      agencyName: emptyToNull(row.agency_name),
      numPhotos: intOrNull(row.num_photos),
      refNo: emptyToNull(row.ref_no),
      totalOffers: intOrNull(row.total_offers),
      scrapedAt: emptyToNull(row.scraped_at) ?? "",
    })
  );
}

export function readRawCsv(filePath: string): RawListing[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ExtractionError(`Cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
  return parseRawCsv(text, filePath);
}
