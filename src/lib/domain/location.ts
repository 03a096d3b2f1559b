import { CITY_ALIASES, NEIGHBORHOOD_ALIASES, normalizeKey } from "./aliases";
import { UNKNOWN, type City } from "./types";

/** How a site writes its location string. */
export interface LocationFormat {
  /** Splits the location text into tokens */
  delimiter: RegExp;
  /** Which token comes first */
  order: "city-first" | "neighborhood-first";
}

export const DEFAULT_LOCATION_FORMAT: LocationFormat = {
  delimiter: /\s*,\s*/,
  order: "city-first",
};

export interface ResolvedLocation {
  city: City;
  neighborhood: string;
  /** Tokens that did not resolve, for unknown-value tracking */
  unresolvedCity: string | null;
  unresolvedNeighborhood: string | null;
}

const PREFIX_PATTERN = /^(?:гр\.|град|с\.|село|кв\.|ж\.\s*к\.|жк|област|обл\.)\s*/;

/** Strip settlement and district prefixes like "гр." or "ж.к.". */
export function stripLocationPrefix(token: string): string {
  let result = normalizeKey(token);
  let previous = "";
  while (result !== previous) {
    previous = result;
    result = result.replace(PREFIX_PATTERN, "").trim();
  }
  return result;
}

/**
 * Split a location text by the site's format and resolve both tokens to
 * canonical values. When the declared city token does not resolve but the
 * other one does, the tokens are swapped.
 */
export function resolveLocation(
  text: string | null | undefined,
  format: LocationFormat = DEFAULT_LOCATION_FORMAT
): ResolvedLocation {
  const tokens = (text ?? "")
    .split(format.delimiter)
    .map(stripLocationPrefix)
    .filter((t) => t.length > 0);

  if (tokens.length === 0) {
    return {
      city: UNKNOWN,
      neighborhood: UNKNOWN,
      unresolvedCity: null,
      unresolvedNeighborhood: null,
    };
  }

  let [cityToken, hoodToken] =
    format.order === "city-first"
      ? [tokens[0], tokens[1] ?? null]
      : [tokens[1] ?? null, tokens[0]];

  let city = CITY_ALIASES.match(cityToken);
  if (city === null && hoodToken !== null) {
    const swapped = CITY_ALIASES.match(hoodToken);
    if (swapped !== null) {
      city = swapped;
      [cityToken, hoodToken] = [hoodToken, cityToken];
    }
  }

  const hoods = city !== null ? NEIGHBORHOOD_ALIASES.get(city) : undefined;
  const neighborhood = hoods?.match(hoodToken) ?? null;

  return {
    city: city ?? UNKNOWN,
    neighborhood: neighborhood ?? UNKNOWN,
    unresolvedCity: city === null ? cityToken : null,
    unresolvedNeighborhood: neighborhood === null ? hoodToken : null,
  };
}
