/**
 * imoti.net: HTML search results, one `li.clearfix` per listing.
 * The page count comes from the paginator's last-page link.
 */
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { parseAllText, parseAttr, parseNumber, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.imoti.net";

export const IMOTINET_CONFIG: SiteConfig = {
  name: "ImotiNet",
  baseUrl: BASE_URL,
  encoding: "utf-8",
  sourceType: "html",
  rateLimitMs: 1000,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "city-first" },
};

const ITEM_SELECTOR = "li.clearfix";

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const items = $(ITEM_SELECTOR);
  if (items.length === 0 && $("nav.paginator, #number-of-estates").length === 0) {
    throw new ExtractionError("ImotiNet: page has no result list", {
      site: "ImotiNet",
      url: ctx.searchUrl,
    });
  }

  const offers = parseNumber(parseText($.root(), "#number-of-estates"));

  for (const el of items.toArray()) {
    const item = $(el);
    const detailsUrl = resolveUrl(parseAttr(item, "a.box-link", "href"), BASE_URL);
    if (!detailsUrl) {
      console.warn("[ImotiNet] Skipping item without a details link");
      continue;
    }

    const title = parseText(item, "h3");
    // "Двустаен апартамент, 65 кв.м." carries the area after the comma
    const titleParts = title?.split(",") ?? [];
    const params = parseAllText(item, "ul.parameters li");
    const paragraphs = parseAllText(item, "p");

    yield createRawListing({
      site: "ImotiNet",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: parseText(item, "strong.price"),
      locationText: parseText(item, "span.location"),
      title,
      areaText: titleParts.length > 1 ? titleParts[1].trim() : null,
      floorText: params[0] ?? null,
      description: paragraphs[1] ?? paragraphs[0] ?? null,
      agencyName: parseText(item, "span.re-offer-type"),
      numPhotos: parseNumber(parseText(item, "span.pic-video-info-number")),
      totalOffers: offers,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function totalPages($: CheerioAPI): number {
  return parseNumber(parseText($.root(), "nav.paginator a.last-page")) ?? 1;
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if (pageNumber > totalPages($)) return null;

  if (/[?&]page=\d+/.test(currentUrl)) {
    return currentUrl.replace(/([?&])page=\d+/, `$1page=${pageNumber}`);
  }
  const separator = currentUrl.includes("?") ? "&" : "?";
  return `${currentUrl}${separator}page=${pageNumber}`;
}

export const imotiNetAdapter = createHtmlAdapter({
  config: IMOTINET_CONFIG,
  extractListings,
  getNextPageUrl,
});
