/**
 * bazar.bg: classifieds. Each result is one `a.listItemLink` carrying the
 * title and id as attributes; area and floor only appear inside the title.
 * The sale/rent section is read from the page's canonical URL.
 */
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { parseAllText, parseAttr, parseNumber, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://bazar.bg";

export const BAZARBG_CONFIG: SiteConfig = {
  name: "BazarBg",
  baseUrl: BASE_URL,
  encoding: "utf-8",
  sourceType: "html",
  rateLimitMs: 1500,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "city-first" },
};

const ITEM_SELECTOR = "div.listItemContainer";
const AREA_PATTERN = /\d+(?:[.,]\d+)?\s*кв\.?\s*м/i;
const FLOOR_PATTERN = /\d+(?:-[а-я]+)?\s*ет\.?|ет(?:аж|\.)\s*\d+/i;

function totalOffers($: CheerioAPI): number | null {
  for (const selector of ["meta[name='description']", "meta[property='og:description']"]) {
    const match = $(selector).attr("content")?.match(/Над\s*([\d\s]+)\s*обяви/);
    if (match) return parseNumber(match[1]);
  }
  return null;
}

/** "Продава" or "Наем" from the section in the page URL. */
function sectionOffer($: CheerioAPI): string | null {
  const url = $("link[rel='canonical']").attr("href") ?? $("meta[property='og:url']").attr("content") ?? "";
  if (/prodazhba|prodava/i.test(url)) return "Продава";
  if (/naem/i.test(url)) return "Наем";
  return null;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const items = $(ITEM_SELECTOR);
  const offers = totalOffers($);
  if (items.length === 0 && $("div.paging").length === 0 && offers === null) {
    throw new ExtractionError("BazarBg: page has no result list", {
      site: "BazarBg",
      url: ctx.searchUrl,
    });
  }

  const section = sectionOffer($);

  for (const el of items.toArray()) {
    const item = $(el);
    const link = item.find("a.listItemLink").first();
    const detailsUrl = resolveUrl(link.attr("href"), BASE_URL);
    if (!detailsUrl) {
      console.warn("[BazarBg] Skipping item without a details link");
      continue;
    }

    const linkTitle = link.attr("title")?.trim() ?? "";
    const title =
      section && !/продава|наем|под наем/i.test(linkTitle) ? `${section} ${linkTitle}`.trim() : linkTitle;

    yield createRawListing({
      site: "BazarBg",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: parseText(link, "span.price"),
      locationText: parseText(link, "span.location"),
      title: title.length > 0 ? title : null,
      areaText: linkTitle.match(AREA_PATTERN)?.[0] ?? null,
      floorText: linkTitle.match(FLOOR_PATTERN)?.[0] ?? null,
      numPhotos: item.find("img.cover, img.photo, img.lazy").length,
      refNo: parseAttr(item, "a.listItemLink", "data-id"),
      totalOffers: offers,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function lastPage($: CheerioAPI): number {
  const labels = parseAllText($.root(), "div.paging a.btn.not-current");
  const last = labels.length > 0 ? parseNumber(labels[labels.length - 1]) : null;
  return last ?? 1;
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if ($(ITEM_SELECTOR).length === 0) return null;
  if (pageNumber > lastPage($)) return null;

  if (/[?&]page=\d+/.test(currentUrl)) {
    return currentUrl.replace(/([?&])page=\d+/, `$1page=${pageNumber}`);
  }
  const separator = currentUrl.includes("?") ? "&" : "?";
  return `${currentUrl}${separator}page=${pageNumber}`;
}

export const bazarBgAdapter = createHtmlAdapter({
  config: BAZARBG_CONFIG,
  extractListings,
  getNextPageUrl,
});
