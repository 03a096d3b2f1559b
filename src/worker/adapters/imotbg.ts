/**
 * imot.bg: server-rendered HTML search results in windows-1251.
 *
 * Each result is a `div.item`; the title link carries the location in a
 * nested <location> tag, and area/floor are folded into one info line
 * ("56 кв.м, 6-ти ет. от 8, ..."). Pages are addressed as `/p-N`.
 */
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { parseAttr, parseSpacedText, parseText, parseNumber, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.imot.bg";

export const IMOTBG_CONFIG: SiteConfig = {
  name: "ImotBg",
  baseUrl: BASE_URL,
  encoding: "windows-1251",
  sourceType: "html",
  rateLimitMs: 1000,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "city-first" },
};

const ITEM_SELECTOR = "div.item";
const AREA_PATTERN = /\d+(?:[.,]\d+)?\s*кв\.?\s*м/i;
const FLOOR_PATTERN = /\d+(?:-[а-я]+)?\s*ет\.?(?:\s*от\s*\d+)?|ет\.?\s*\d+/i;

function totalOffers($: CheerioAPI): number | null {
  const info = parseText($.root(), "span.pageNumbersInfo");
  const match = info?.match(/от\s*общо\s*([\d\s]+)/);
  return match ? parseNumber(match[1]) : null;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const items = $(ITEM_SELECTOR);
  if (items.length === 0 && $("span.pageNumbersInfo").length === 0) {
    throw new ExtractionError("ImotBg: page has no result list", {
      site: "ImotBg",
      url: ctx.searchUrl,
    });
  }

  const offers = totalOffers($);

  for (const el of items.toArray()) {
    const item = $(el);
    const detailsUrl = resolveUrl(parseAttr(item, "a.title", "href"), BASE_URL);
    if (!detailsUrl) {
      console.warn(`[ImotBg] Skipping item ${item.attr("id") ?? "?"} without a details link`);
      continue;
    }

    const titleLink = item.find("a.title").first();
    const locationText = parseText(titleLink, "location");
    const title = titleLink.text().replace(titleLink.find("location").text(), "").trim();
    const info = parseText(item, "div.info");
    const photos = parseText(item, "a.photos")?.match(/(\d+)\s*снимк/);
    const refNo = item.attr("id")?.match(/id[a-z]?(\d+)/);

    yield createRawListing({
      site: "ImotBg",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: parseSpacedText(item, "div.price div"),
      locationText,
      title: title.length > 0 ? title.replace(/\s+/g, " ") : null,
      areaText: info?.match(AREA_PATTERN)?.[0] ?? null,
      floorText: info?.match(FLOOR_PATTERN)?.[0] ?? null,
      description: info,
      agencyName: parseText(item, "div.seller div.name"),
      numPhotos: photos ? parseInt(photos[1], 10) : null,
      refNo: refNo ? refNo[1] : null,
      totalOffers: offers,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if ($(ITEM_SELECTOR).length === 0) return null;

  const base = currentUrl.replace(/\/p-\d+/, "");
  const queryStart = base.indexOf("?");
  if (queryStart >= 0) {
    return `${base.slice(0, queryStart)}/p-${pageNumber}${base.slice(queryStart)}`;
  }
  return `${base}/p-${pageNumber}`;
}

export const imotBgAdapter = createHtmlAdapter({
  config: IMOTBG_CONFIG,
  extractListings,
  getNextPageUrl,
});
