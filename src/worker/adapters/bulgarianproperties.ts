/**
 * bulgarianproperties.bg: agency site in windows-1251. Cards list area and
 * floor together in `.size`; listings without a broker name belong to the
 * agency itself.
 */
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { parseAttr, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.bulgarianproperties.bg";
const AGENCY = "Bulgarian Properties";

export const BULGARIANPROPERTIES_CONFIG: SiteConfig = {
  name: "BulgarianProperties",
  baseUrl: BASE_URL,
  encoding: "windows-1251",
  sourceType: "html",
  rateLimitMs: 1500,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "neighborhood-first" },
};

const ITEM_SELECTOR = "div.component-property-item";

function areaText(size: string): string | null {
  const labelled = size.match(/Площ:\s*([\d.,]+\s*м2?)/i);
  if (labelled) return labelled[1];
  return size.match(/[\d.,]+\s*(?:м2|кв\.?\s*м)/i)?.[0] ?? null;
}

/** "imot-89171-..." or ".../89171.html" */
function refNo(detailsUrl: string): string | null {
  return detailsUrl.match(/imot-(\d+)/i)?.[1] ?? detailsUrl.match(/\/(\d+)\.html/)?.[1] ?? null;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const items = $(ITEM_SELECTOR);
  if (items.length === 0 && $(".pagination, .no-results").length === 0) {
    throw new ExtractionError("BulgarianProperties: page has no result list", {
      site: "BulgarianProperties",
      url: ctx.searchUrl,
    });
  }

  for (const el of items.toArray()) {
    const item = $(el);
    const href =
      parseAttr(item, "a.title", "href") ??
      parseAttr(item, ".property-item-top a.image", "href") ??
      parseAttr(item, "a[href*='/imoti/']", "href");
    const detailsUrl = resolveUrl(href, BASE_URL);
    if (!detailsUrl) {
      console.warn("[BulgarianProperties] Skipping item without a details link");
      continue;
    }

    const size = parseText(item, ".size") ?? "";

    yield createRawListing({
      site: "BulgarianProperties",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: parseText(item, ".new-price") ?? parseText(item, ".regular-price"),
      locationText: parseText(item, ".location"),
      title: parseText(item, "a.title, .title a, .content .title"),
      areaText: areaText(size),
      floorText: size.match(/Етаж:\s*(-?\d+)/)?.[1] ?? null,
      description: parseText(item, ".list-description, .description"),
      agencyName: parseText(item, ".broker .broker-info .name, .broker .name") ?? AGENCY,
      numPhotos: item.find(".property-item-top img").length,
      refNo: refNo(detailsUrl),
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function lastPage($: CheerioAPI): number | null {
  let last: number | null = null;
  for (const el of $("a.page, .pagination a, a[href*='page=']").toArray()) {
    const link = $(el);
    const fromHref = link.attr("href")?.match(/[?&]page=(\d+)/)?.[1];
    const label = link.text().trim();
    const value = fromHref ? parseInt(fromHref, 10) : /^\d+$/.test(label) ? parseInt(label, 10) : null;
    if (value !== null && (last === null || value > last)) last = value;
  }
  return last;
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if ($(ITEM_SELECTOR).length === 0) return null;
  const last = lastPage($);
  if (last !== null && pageNumber > last) return null;

  if (/[?&]page=\d+/.test(currentUrl)) {
    return currentUrl.replace(/([?&])page=\d+/, `$1page=${pageNumber}`);
  }
  const separator = currentUrl.includes("?") ? "&" : "?";
  return `${currentUrl}${separator}page=${pageNumber}`;
}

export const bulgarianPropertiesAdapter = createHtmlAdapter({
  config: BULGARIANPROPERTIES_CONFIG,
  extractListings,
  getNextPageUrl,
});
