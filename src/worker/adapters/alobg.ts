/**
 * alo.bg: classifieds. Promoted ("vip") and regular ("top") results share
 * one layout with different class prefixes. Listing attributes come as
 * label/value parameter rows.
 */
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { cleanText, parseAllText, parseAttr, parseNumber, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.alo.bg";

export const ALOBG_CONFIG: SiteConfig = {
  name: "AloBg",
  baseUrl: BASE_URL,
  encoding: "utf-8",
  sourceType: "html",
  rateLimitMs: 1500,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "neighborhood-first" },
};

const ITEM_SELECTOR = "div.listtop-item, div.listvip-item";
const COUNT_SELECTORS = [".search-results-count", ".results-count", ".list-count", "h1", ".category-list-title"];

/** Label to value, from both single-value rows and multi-value cells. */
function readParams($: CheerioAPI, item: Cheerio<Element>): Map<string, string> {
  const params = new Map<string, string>();
  for (const row of item.find(".ads-params-row").toArray()) {
    const label = parseText($(row), ".ads-param-title")?.replace(/:$/, "");
    const value = parseText($(row), ".ads-params-cell .ads-params-single");
    if (label && value) params.set(label, value);
  }
  for (const cell of item.find(".ads-params-multi[title]").toArray()) {
    const label = $(cell).attr("title")?.trim().replace(/:$/, "");
    const value = cleanText($(cell).text());
    if (label && value.length > 0 && !params.has(label)) params.set(label, value);
  }
  return params;
}

function totalOffers($: CheerioAPI): number | null {
  for (const selector of COUNT_SELECTORS) {
    const match = parseText($.root(), selector)?.match(/(\d[\d\s]*)\s*обяв/);
    if (match) return parseNumber(match[1]);
  }
  return null;
}

function refNoFromUrl(url: string): string | null {
  const match = url.match(/\/obiava\/(\d+)/) ?? url.match(/-(\d{6,})/);
  return match ? match[1] : null;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const items = $(ITEM_SELECTOR);
  const offers = totalOffers($);
  const recognized = $("div.my-paginator, div.no-results").length > 0 || offers !== null;
  if (items.length === 0 && !recognized) {
    throw new ExtractionError("AloBg: page has no result list", {
      site: "AloBg",
      url: ctx.searchUrl,
    });
  }

  for (const el of items.toArray()) {
    const item = $(el);
    const title = parseText(item, "h3.listtop-item-title, h3.listvip-item-title");
    if (!title) {
      console.warn("[AloBg] Skipping item without a title");
      continue;
    }
    const detailsUrl = resolveUrl(parseAttr(item, "a[href]", "href"), BASE_URL);
    if (!detailsUrl) {
      console.warn(`[AloBg] Skipping "${title}" without a details link`);
      continue;
    }

    const params = readParams($, item);
    const kind = params.get("Вид на имота");
    const desc = parseText(item, ".listtop-desc, .listvip-desc");
    const descParts = [kind ? `Вид на имота: ${kind}` : null, desc].filter(
      (part): part is string => part !== null,
    );
    const photos = item.find("img.listtop-item-photo, img.listvip-item-photo, .gallery img").length;

    yield createRawListing({
      site: "AloBg",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: params.get("Цена") ?? null,
      locationText: parseText(item, ".listtop-item-address i, .listvip-item-address i"),
      title,
      areaText: params.get("Квадратура") ?? null,
      floorText: params.get("Номер на етажа") ?? null,
      description: descParts.length > 0 ? descParts.join(". ") : null,
      agencyName: parseAllText(item, ".listtop-publisher span, .listvip-publisher span")[0] ?? null,
      numPhotos: photos,
      refNo: refNoFromUrl(detailsUrl),
      totalOffers: offers,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function lastPage($: CheerioAPI): number {
  const numbers = parseAllText($.root(), "div.my-paginator a")
    .map((text) => (/^\d+$/.test(text) ? parseInt(text, 10) : 0));
  return Math.max(1, ...numbers);
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

export const aloBgAdapter = createHtmlAdapter({
  config: ALOBG_CONFIG,
  extractListings,
  getNextPageUrl,
});
