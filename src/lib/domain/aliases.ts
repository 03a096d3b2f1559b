/**
 * Alias tables mapping scraped spellings (Cyrillic, transliterated, URL slugs)
 * to canonical values. The data lives in aliases.json.
 */
import aliasData from "./aliases.json";
import {
  CITIES,
  CURRENCIES,
  OFFER_TYPES,
  PROPERTY_TYPES,
  type Currency,
  type KnownCity,
} from "./types";

/**
 * Normalize text for alias comparison:
 * - Lowercase
 * - Collapse whitespace (including non-breaking spaces) and trim
 */
export function normalizeKey(input: string): string {
  return input.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Lookup from alias to canonical value. Matching tries the whole text first,
 * then the longest alias contained in it.
 */
export class AliasTable<T extends string> {
  private readonly exact = new Map<string, T>();
  private readonly longestFirst: Array<[string, T]>;

  constructor(entries: Iterable<readonly [T, readonly string[]]>) {
    for (const [canonical, aliases] of entries) {
      for (const alias of [canonical, ...aliases]) {
        const key = normalizeKey(alias);
        if (key.length > 0 && !this.exact.has(key)) {
          this.exact.set(key, canonical);
        }
      }
    }
    this.longestFirst = [...this.exact.entries()].sort(
      (a, b) => b[0].length - a[0].length
    );
  }

  static fromRecord<K extends string>(
    keys: readonly K[],
    table: Record<K, readonly string[]>
  ): AliasTable<K> {
    return new AliasTable(keys.map((k) => [k, table[k]] as const));
  }

  matchExact(text: string | null | undefined): T | null {
    if (!text) return null;
    return this.exact.get(normalizeKey(text)) ?? null;
  }

  match(text: string | null | undefined): T | null {
    if (!text) return null;
    const key = normalizeKey(text);
    if (key.length === 0) return null;

    const exact = this.exact.get(key);
    if (exact !== undefined) return exact;

    for (const [alias, canonical] of this.longestFirst) {
      if (key.includes(alias)) return canonical;
    }
    return null;
  }

  get size(): number {
    return this.exact.size;
  }
}

export const CITY_ALIASES = AliasTable.fromRecord(CITIES, aliasData.cities);

export const NEIGHBORHOOD_ALIASES: ReadonlyMap<KnownCity, AliasTable<string>> =
  new Map(
    CITIES.map(
      (city) =>
        [city, new AliasTable(Object.entries(aliasData.neighborhoods[city]))] as const
    )
  );

export const PROPERTY_TYPE_ALIASES = AliasTable.fromRecord(
  PROPERTY_TYPES,
  aliasData.propertyTypes
);

export const OFFER_TYPE_ALIASES = AliasTable.fromRecord(
  OFFER_TYPES,
  aliasData.offerTypes
);

export const AGENCY_ALIASES = new AliasTable(Object.entries(aliasData.agencies));

/** Lower-cased currency marker -> currency */
export const CURRENCY_MARKERS: ReadonlyMap<string, Currency> = new Map(
  CURRENCIES.flatMap((currency) =>
    aliasData.currencies[currency].map((marker) => [normalizeKey(marker), currency] as const)
  )
);
