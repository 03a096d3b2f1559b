/**
 * Domain types shared by extractors, the transformer and the CSV layer.
 * These are plain readonly records; nothing mutates them after construction.
 */

export const CITIES = ["Sofia", "Plovdiv", "Varna", "Burgas"] as const;
export type KnownCity = (typeof CITIES)[number];
export type City = KnownCity | "unknown";

export const PROPERTY_TYPES = [
  "studio",
  "one-bedroom",
  "two-bedroom",
  "three-bedroom",
  "multi-bedroom",
  "maisonette",
  "house",
  "land",
  "office",
  "garage",
  "other",
] as const;
export type PropertyType = (typeof PROPERTY_TYPES)[number] | "unknown";

export const OFFER_TYPES = ["sale", "rent"] as const;
export type OfferType = (typeof OFFER_TYPES)[number] | "unknown";

export const CURRENCIES = ["EUR", "BGN"] as const;
export type Currency = (typeof CURRENCIES)[number];

/** A floor number (negative for basements) or one of the named levels. */
export type Floor = number | "ground" | "attic";

export const UNKNOWN = "unknown";

/**
 * Raw record as scraped. Every text field may be null; absence is passed
 * through to the transformer untouched.
 */
export interface RawListing {
  readonly site: string;
  readonly detailsUrl: string;
  readonly searchUrl: string | null;
  readonly priceText: string | null;
  readonly locationText: string | null;
  readonly title: string | null;
  readonly areaText: string | null;
  readonly floorText: string | null;
  readonly totalFloorsText: string | null;
  readonly description: string | null;
  readonly agencyName: string | null;
  readonly numPhotos: number | null;
  readonly refNo: string | null;
  readonly totalOffers: number | null;
  /** ISO-8601 timestamp of the extraction pass */
  readonly scrapedAt: string;
}

export type RawListingInput = Pick<RawListing, "site" | "detailsUrl" | "scrapedAt"> &
  Partial<Omit<RawListing, "site" | "detailsUrl" | "scrapedAt">>;

/** Normalized listing. Prices are always EUR. */
export interface ListingData {
  readonly site: string;
  readonly detailsUrl: string;
  readonly searchUrl: string | null;
  /** 0 means "price on request"; null means missing or unparsable */
  readonly price: number | null;
  readonly originalCurrency: Currency | null;
  readonly pricePerM2: number | null;
  readonly city: City;
  readonly neighborhood: string;
  readonly propertyType: PropertyType;
  readonly offerType: OfferType;
  readonly area: number | null;
  readonly floor: Floor | null;
  readonly totalFloors: number | null;
  readonly rawTitle: string | null;
  readonly rawLocation: string | null;
  readonly agency: string | null;
  readonly numPhotos: number | null;
  readonly refNo: string | null;
  readonly scrapedAt: string;
  readonly fingerprintHash: string;
}

/** Build a frozen RawListing, filling omitted optional fields with null. */
export function createRawListing(input: RawListingInput): RawListing {
  return Object.freeze({
    site: input.site,
    detailsUrl: input.detailsUrl,
    searchUrl: input.searchUrl ?? null,
    priceText: input.priceText ?? null,
    locationText: input.locationText ?? null,
    title: input.title ?? null,
    areaText: input.areaText ?? null,
    floorText: input.floorText ?? null,
    totalFloorsText: input.totalFloorsText ?? null,
    description: input.description ?? null,
    agencyName: input.agencyName ?? null,
    numPhotos: input.numPhotos ?? null,
    refNo: input.refNo ?? null,
    totalOffers: input.totalOffers ?? null,
    scrapedAt: input.scrapedAt,
  });
}
