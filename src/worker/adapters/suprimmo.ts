/**
 * suprimmo.bg: agency site, HTML in windows-1251. Offer cards are
 * `div.panel.offer`; the offer kind (sale or rent) lives in an inline
 * tracking script rather than on the card.
 */
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { cleanText, parseAttr, parseNumber, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.suprimmo.bg";

export const SUPRIMMO_CONFIG: SiteConfig = {
  name: "Suprimmo",
  baseUrl: BASE_URL,
  encoding: "windows-1251",
  sourceType: "html",
  rateLimitMs: 1500,
  maxPages: 100,
  locationFormat: { delimiter: /\s*[/,]\s*/, order: "city-first" },
};

const ITEM_SELECTOR = "div.panel.offer";

function offerWord($: CheerioAPI): string | null {
  const scripts = $("script").toArray();
  for (const script of scripts) {
    const code = $(script).html() ?? "";
    if (!code.includes("listing_pagetype")) continue;
    if (/type\s*:\s*['"]продава['"]/i.test(code)) return "Продава";
    if (/type\s*:\s*['"]наем['"]/i.test(code)) return "Наем";
  }
  return null;
}

function totalOffers($: CheerioAPI): number | null {
  const match = parseText($.root(), "p.font-medium.font-semibold")?.match(/(\d[\d\s]*)\s*намерени/);
  return match ? parseNumber(match[1]) : null;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const items = $(ITEM_SELECTOR);
  if (items.length === 0 && $("p.font-medium.font-semibold").length === 0) {
    throw new ExtractionError("Suprimmo: page has no result list", {
      site: "Suprimmo",
      url: ctx.searchUrl,
    });
  }

  const offer = offerWord($);
  const offers = totalOffers($);

  for (const el of items.toArray()) {
    const item = $(el);
    const href =
      parseAttr(item, "a.lnk", "href") ?? parseAttr(item, "div.foot a.button[href*='/imot-']", "href");
    const detailsUrl = resolveUrl(href, BASE_URL);
    if (!detailsUrl) {
      console.warn("[Suprimmo] Skipping offer without a details link");
      continue;
    }

    const priceRaw = parseText(item, "div.prc");
    const euro = priceRaw?.match(/([\d\s]+)\s*€/);
    const priceText = euro ? `${euro[1].trim()} €` : priceRaw;

    const loc = item.find("div.loc").first();
    const locationText = cleanText(loc.text().replace(loc.find("a.property_map").text(), ""));

    const ttl = item.find("div.ttl").first();
    const ttlText = cleanText(ttl.text().replace(ttl.find("i").text(), ""));
    const title = ttlText.length > 0 ? (offer ? `${offer} ${ttlText}` : ttlText) : null;

    const details = parseText(item, "div.lst") ?? "";
    const badges = item
      .find("span.badge")
      .not(".has_luximo")
      .toArray()
      .map((badge) => cleanText($(badge).text()))
      .filter((text) => text.length > 0);

    yield createRawListing({
      site: "Suprimmo",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText,
      locationText: locationText.length > 0 ? locationText : null,
      title,
      areaText: details.match(/Площ:\s*([\d.,]+\s*м)/)?.[1] ?? null,
      floorText: details.match(/Етаж:\s*([^\s,]+)/)?.[1] ?? null,
      totalFloorsText: details.match(/Етажност на сградата:\s*(\d+)/)?.[1] ?? null,
      description: badges.length > 0 ? badges.join(", ") : null,
      agencyName: "Suprimmo",
      numPhotos: item.find("div.slider-embed div.item").length,
      refNo: item.attr("data-prop-id") ?? null,
      totalOffers: offers,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if ($(ITEM_SELECTOR).length === 0) return null;
  const next = $("link[rel='next']").attr("href");
  if (!next) return null;
  if (pageNumber === 2) return resolveUrl(next, BASE_URL);

  const base = currentUrl.replace(/\/page\/\d+\/?$/, "").replace(/\/+$/, "");
  return `${base}/page/${pageNumber}/`;
}

export const suprimmoAdapter = createHtmlAdapter({
  config: SUPRIMMO_CONFIG,
  extractListings,
  getNextPageUrl,
});
