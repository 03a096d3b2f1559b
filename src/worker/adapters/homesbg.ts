/**
 * homes.bg: JSON search API. Each page holds up to 100 offers in `result`
 * and says whether more follow in `hasMoreItems`.
 */
import { z } from "zod";
import {
  createJsonAdapter,
  targetsFromUrls,
  uniqueFolders,
  type PageContext,
  type SearchTarget,
  type SiteConfig,
} from "./SourceAdapter";
import { resolveUrl } from "../html/parse";
import type { SiteSearchConfig } from "@/lib/config";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ConfigError, ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.homes.bg";
export const PAGE_SIZE = 100;

export const APARTMENTS_URL = `${BASE_URL}/api/offers?currencyId=1&filterOrderBy=0&locationId=1&typeId=ApartmentSell`;
export const LAND_URL = `${BASE_URL}/api/offers?currencyId=1&filterOrderBy=0&locationId=0&typeId=LandAgro`;

export const HOMESBG_CONFIG: SiteConfig = {
  name: "HomesBg",
  baseUrl: BASE_URL,
  encoding: "utf-8",
  sourceType: "json",
  rateLimitMs: 2000,
  maxPages: 30,
  locationFormat: { delimiter: /\s*,\s*/, order: "neighborhood-first" },
};

const OfferSchema = z.object({
  id: z.union([z.number(), z.string()]).nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  location: z.string().nullish(),
  price: z
    .object({
      value: z.union([z.number(), z.string()]).nullish(),
      currency: z.string().nullish(),
    })
    .nullish(),
  viewHref: z.string().min(1),
  photos: z.array(z.unknown()).nullish(),
});

const SearchResponseSchema = z.object({
  searchCriteria: z.object({ typeId: z.string().nullish() }).nullish(),
  hasMoreItems: z.boolean().nullish(),
  result: z.array(z.unknown()),
});

type SearchResponse = z.infer<typeof SearchResponseSchema>;

const AREA_PATTERN = /\d+(?:[.,]\d+)?\s*(?:кв\.?\s*м|m²|m2|м²)/i;

function parse(json: unknown): SearchResponse {
  const parsed = SearchResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ExtractionError("HomesBg: response has no result array", { site: "HomesBg" });
  }
  return parsed.data;
}

function offerWord(typeId: string | null | undefined): string | null {
  if (!typeId) return null;
  if (/sell/i.test(typeId)) return "Продава";
  if (/rent/i.test(typeId)) return "Наем";
  return null;
}

function* extractListings(data: SearchResponse, ctx: PageContext): Generator<RawListing> {
  const offer = offerWord(data.searchCriteria?.typeId);

  for (const [index, entry] of data.result.entries()) {
    const parsed = OfferSchema.safeParse(entry);
    if (!parsed.success) {
      console.warn(`[HomesBg] Skipping malformed offer at index ${index}`);
      continue;
    }
    const item = parsed.data;
    const detailsUrl = resolveUrl(item.viewHref, BASE_URL);
    if (!detailsUrl) {
      console.warn(`[HomesBg] Skipping offer ${item.id ?? index} with a bad link`);
      continue;
    }

    const value = item.price?.value;
    const priceText =
      value !== null && value !== undefined
        ? `${value} ${item.price?.currency ?? ""}`.trim()
        : null;
    const title = item.title ? (offer ? `${offer} ${item.title}` : item.title) : null;

    yield createRawListing({
      site: "HomesBg",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText,
      locationText: item.location ?? null,
      title,
      areaText:
        item.title?.match(AREA_PATTERN)?.[0] ?? item.description?.match(AREA_PATTERN)?.[0] ?? null,
      description: item.description ?? null,
      numPhotos: item.photos ? item.photos.length : null,
      refNo: item.id !== null && item.id !== undefined ? String(item.id) : null,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function getNextPageUrl(data: SearchResponse, currentUrl: string, pageNumber: number): string | null {
  if (!data.hasMoreItems) return null;
  const startIndex = (pageNumber - 1) * PAGE_SIZE;
  const stopIndex = pageNumber * PAGE_SIZE;
  const base = currentUrl.split("&startIndex")[0];
  return `${base}&startIndex=${startIndex}&stopIndex=${stopIndex}`;
}

/**
 * Targets from explicit `urls`, one apartment search per neighbourhood id,
 * and the land search when `includeLand` is set.
 */
function buildUrls(searchConfig: SiteSearchConfig): SearchTarget[] {
  const { urls, neighborhoodIds, includeLand } = searchConfig;
  if (urls === undefined && neighborhoodIds === undefined && includeLand === undefined) {
    throw new ConfigError('HomesBg: config needs "urls", "neighborhoodIds" or "includeLand"', {
      site: "HomesBg",
    });
  }

  const targets = urls ? targetsFromUrls(urls) : [];
  for (const id of neighborhoodIds ?? []) {
    targets.push({
      url: `${APARTMENTS_URL}&neighbourhoods%5B%5D=${id}`,
      name: `apartments-${id}`,
      folder: `apartments-${id}`,
    });
  }
  if (includeLand) {
    targets.push({ url: LAND_URL, name: "land", folder: "land" });
  }
  return uniqueFolders(targets);
}

export const homesBgAdapter = createJsonAdapter({
  config: HOMESBG_CONFIG,
  buildUrls,
  parse,
  extractListings,
  getNextPageUrl,
});
