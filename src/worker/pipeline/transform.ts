/**
 * RawListing -> ListingData. Pure apart from unknown-value bookkeeping:
 * the same raw record and options always give the same output.
 */
import { AGENCY_ALIASES, OFFER_TYPE_ALIASES, PROPERTY_TYPE_ALIASES } from "@/lib/domain/aliases";
import { computeFingerprint } from "@/lib/domain/fingerprint";
import {
  DEFAULT_LOCATION_FORMAT,
  resolveLocation,
  type LocationFormat,
  type ResolvedLocation,
} from "@/lib/domain/location";
import {
  BGN_PER_EUR,
  parseArea,
  parseFloor,
  parsePrice,
  parseTotalFloors,
  roundTo,
  toEur,
} from "@/lib/domain/normalize";
import {
  UNKNOWN,
  type Currency,
  type Floor,
  type ListingData,
  type OfferType,
  type PropertyType,
  type RawListing,
} from "@/lib/domain/types";
import { TransformError, errorMessage } from "@/lib/errors";

export interface TransformerOptions {
  /** BGN per EUR used for conversion (default 1.95583) */
  bgnPerEur?: number;
  /** Currency of amounts written without a marker (default EUR) */
  defaultCurrency?: Currency;
  /** Location format per site name; sites not listed use "city, neighborhood" */
  locationFormats?: ReadonlyMap<string, LocationFormat>;
}

export type UnknownKind = "city" | "neighborhood" | "propertyType" | "offerType";

/** Counts the texts that did not resolve to a canonical value during a run. */
export class UnknownValueTracker {
  private readonly counts = new Map<UnknownKind, Map<string, number>>();

  record(kind: UnknownKind, value: string | null): void {
    const key = value?.trim() || "(empty)";
    const byValue = this.counts.get(kind) ?? new Map<string, number>();
    byValue.set(key, (byValue.get(key) ?? 0) + 1);
    this.counts.set(kind, byValue);
  }

  /** Values of one kind, most frequent first. */
  values(kind: UnknownKind): Array<[string, number]> {
    return [...(this.counts.get(kind) ?? new Map<string, number>()).entries()].sort(
      (a, b) => b[1] - a[1] || a[0].localeCompare(b[0])
    );
  }

  get size(): number {
    let total = 0;
    for (const byValue of this.counts.values()) total += byValue.size;
    return total;
  }

  /** Log the top unresolved values of each kind. */
  log(limit = 10): void {
    if (this.size === 0) return;
    console.log("[transform] Unresolved values:");
    for (const kind of ["city", "neighborhood", "propertyType", "offerType"] as const) {
      const values = this.values(kind);
      if (values.length === 0) continue;
      const shown = values
        .slice(0, limit)
        .map(([value, count]) => `"${value}" x${count}`)
        .join(", ");
      const more = values.length > limit ? ` (+${values.length - limit} more)` : "";
      console.log(`  ${kind}: ${shown}${more}`);
    }
  }
}

interface PriceReading {
  /** EUR; 0 for price on request */
  price: number | null;
  currency: Currency | null;
}

export interface BatchResult {
  listings: ListingData[];
  /** Records rejected with TransformError */
  dropped: number;
}

function decodeUrl(url: string | null): string | null {
  if (!url) return null;
  try {
    return decodeURIComponent(url);
  } catch {
    return url;
  }
}

function firstMatch<T extends string>(
  table: { match(text: string | null | undefined): T | null },
  texts: Array<string | null>
): T | null {
  for (const text of texts) {
    const found = table.match(text);
    if (found !== null) return found;
  }
  return null;
}

export class Transformer {
  readonly unknowns: UnknownValueTracker;
  private readonly bgnPerEur: number;
  private readonly defaultCurrency: Currency;
  private readonly locationFormats: ReadonlyMap<string, LocationFormat>;

  constructor(opts: TransformerOptions = {}, unknowns = new UnknownValueTracker()) {
    const {
      bgnPerEur = BGN_PER_EUR,
      defaultCurrency = "EUR",
      locationFormats = new Map<string, LocationFormat>(),
    } = opts;
    this.bgnPerEur = bgnPerEur;
    this.defaultCurrency = defaultCurrency;
    this.locationFormats = locationFormats;
    this.unknowns = unknowns;
  }

  /** Throws TransformError when the record has no site or details URL. */
  transform(raw: RawListing): ListingData {
    if (!raw.site || raw.site.trim() === "") {
      throw new TransformError("Record has no site", { url: raw.detailsUrl });
    }
    if (!raw.detailsUrl || raw.detailsUrl.trim() === "") {
      throw new TransformError("Record has no details URL", { site: raw.site });
    }

    const field = <T>(name: string, fallback: T, read: () => T): T => {
      try {
        return read();
      } catch (err) {
        console.warn(`[transform] ${raw.site} ${raw.detailsUrl}: ${name} dropped (${errorMessage(err)})`);
        return fallback;
      }
    };

    const price = field<PriceReading>("price", { price: null, currency: null }, () =>
      this.readPrice(raw)
    );
    const area = field<number | null>("area", null, () => parseArea(raw.areaText));
    const location = field<ResolvedLocation>(
      "location",
      { city: UNKNOWN, neighborhood: UNKNOWN, unresolvedCity: null, unresolvedNeighborhood: null },
      () => resolveLocation(raw.locationText, this.locationFormats.get(raw.site) ?? DEFAULT_LOCATION_FORMAT)
    );
    const detailsPath = decodeUrl(raw.detailsUrl);
    const propertyType = field<PropertyType>(
      "propertyType",
      UNKNOWN,
      () => firstMatch(PROPERTY_TYPE_ALIASES, [raw.title, detailsPath, raw.description]) ?? UNKNOWN
    );
    const offerType = field<OfferType>(
      "offerType",
      UNKNOWN,
      () => firstMatch(OFFER_TYPE_ALIASES, [raw.title, detailsPath, decodeUrl(raw.searchUrl)]) ?? UNKNOWN
    );

    if (location.city === UNKNOWN) this.unknowns.record("city", location.unresolvedCity);
    if (location.neighborhood === UNKNOWN) {
      this.unknowns.record("neighborhood", location.unresolvedNeighborhood);
    }
    if (propertyType === UNKNOWN) this.unknowns.record("propertyType", raw.title);
    if (offerType === UNKNOWN) this.unknowns.record("offerType", raw.title);

    const pricePerM2 =
      price.price !== null && price.price > 0 && area !== null && area > 0
        ? roundTo(price.price / area, 2)
        : null;
    const agencyName = raw.agencyName?.trim() ?? "";

    return {
      site: raw.site,
      detailsUrl: raw.detailsUrl,
      searchUrl: raw.searchUrl,
      price: price.price,
      originalCurrency: price.currency,
      pricePerM2,
      city: location.city,
      neighborhood: location.neighborhood,
      propertyType,
      offerType,
      area,
      floor: field<Floor | null>("floor", null, () => parseFloor(raw.floorText, raw.description)),
      totalFloors: field<number | null>("totalFloors", null, () =>
        parseTotalFloors(raw.totalFloorsText, raw.floorText, raw.description)
      ),
      rawTitle: raw.title,
      rawLocation: raw.locationText,
      agency: agencyName.length > 0 ? AGENCY_ALIASES.matchExact(agencyName) ?? agencyName : null,
      numPhotos: raw.numPhotos,
      refNo: raw.refNo,
      scrapedAt: raw.scrapedAt,
      fingerprintHash: computeFingerprint({
        site: raw.site,
        city: location.city,
        neighborhood: location.neighborhood,
        propertyType,
        price: price.price,
        area,
        detailsUrl: raw.detailsUrl,
      }),
    };
  }

  /** Transform every record, dropping and counting the ones that fail. */
  transformBatch(raws: Iterable<RawListing>): BatchResult {
    const listings: ListingData[] = [];
    let dropped = 0;
    for (const raw of raws) {
      try {
        listings.push(this.transform(raw));
      } catch (err) {
        if (!(err instanceof TransformError)) throw err;
        dropped++;
        console.warn(`[transform] Dropped record: ${err.message}`);
      }
    }
    return { listings, dropped };
  }

  private readPrice(raw: RawListing): PriceReading {
    const parsed = parsePrice(raw.priceText, this.defaultCurrency);
    if (parsed === null) return { price: null, currency: null };
    if (parsed.kind === "on-request") return { price: 0, currency: this.defaultCurrency };
    return { price: toEur(parsed.amount, parsed.currency, this.bgnPerEur), currency: parsed.currency };
  }
}
