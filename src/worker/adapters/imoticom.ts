/**
 * imoti.com: HTML results inside `div.list`. The location block holds two
 * lines separated by <br>: "city, neighbourhood" then "area, floor". The
 * free-text description is a bare text node of `div.info`.
 */
import type { Cheerio } from "cheerio";
import { isText, type Element } from "domhandler";
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { cleanText, parseAttr, parseSpacedText, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.imoti.com";

export const IMOTICOM_CONFIG: SiteConfig = {
  name: "ImotiCom",
  baseUrl: BASE_URL,
  encoding: "utf-8",
  sourceType: "html",
  rateLimitMs: 1000,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "city-first" },
};

const ITEM_SELECTOR = "div.list div.item";

/** Text of `div.location`, one entry per <br>-separated line. */
function locationLines($: CheerioAPI, scope: Cheerio<Element>): string[] {
  const lines: string[] = [];
  let current = "";
  for (const node of scope.find("div.location").first().contents().toArray()) {
    if ($(node).is("br")) {
      lines.push(cleanText(current));
      current = "";
    } else {
      current += $(node).text();
    }
  }
  lines.push(cleanText(current));
  return lines.filter((line) => line.length > 0);
}

function description(scope: Cheerio<Element>): string | null {
  for (const node of scope.find("div.info").first().contents().toArray()) {
    if (!isText(node)) continue;
    const text = cleanText(node.data);
    if (text.length > 0 && !text.includes("кв.м")) return text;
  }
  return null;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  if ($("div.list").length === 0) {
    throw new ExtractionError("ImotiCom: page has no result list", {
      site: "ImotiCom",
      url: ctx.searchUrl,
    });
  }

  for (const el of $(ITEM_SELECTOR).toArray()) {
    const item = $(el);
    const detailsUrl = resolveUrl(parseAttr(item, "a[href*='/obiava/']", "href"), BASE_URL);
    if (!detailsUrl) {
      console.warn("[ImotiCom] Skipping item without a details link");
      continue;
    }

    const [locationText = null, info = ""] = locationLines($, item);
    const area = info.match(/(\d+)\s*кв\.м/);

    yield createRawListing({
      site: "ImotiCom",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: parseSpacedText(item, "span.price"),
      locationText,
      title: parseText(item, "span.type"),
      areaText: area ? `${area[1]} кв.м` : null,
      floorText: info.match(/ет(?:аж|\.)\s*-?\d+/)?.[0] ?? null,
      description: description(item),
      numPhotos: item.find("div.photo img").length,
      refNo: detailsUrl.match(/\/obiava\/(\d+)/)?.[1] ?? null,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function lastPage($: CheerioAPI): number | null {
  for (const el of $("a.big[href*='page-']").toArray()) {
    const link = $(el);
    if (!link.text().includes("Последна")) continue;
    const match = link.attr("href")?.match(/page-(\d+)/);
    if (match) return parseInt(match[1], 10);
  }
  return null;
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if ($(ITEM_SELECTOR).length === 0) return null;
  const last = lastPage($);
  if (last !== null && pageNumber > last) return null;

  const base = currentUrl.replace(/\/page-\d+/, "");
  const queryStart = base.indexOf("?");
  if (queryStart >= 0) {
    return `${base.slice(0, queryStart)}/page-${pageNumber}${base.slice(queryStart)}`;
  }
  return `${base}/page-${pageNumber}`;
}

export const imotiComAdapter = createHtmlAdapter({
  config: IMOTICOM_CONFIG,
  extractListings,
  getNextPageUrl,
});
