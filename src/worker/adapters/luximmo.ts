/**
 * luximmo.bg: agency site in windows-1251. Pages are numbered through the
 * file name: index.html is page 1, indexN.html is page N+1.
 */
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { createHtmlAdapter, type PageContext, type SiteConfig } from "./SourceAdapter";
import { cleanText, parseAttr, parseNumber, parseText, resolveUrl, type CheerioAPI } from "../html/parse";
import { createRawListing, type RawListing } from "@/lib/domain/types";
import { ExtractionError } from "@/lib/errors";

const BASE_URL = "https://www.luximmo.bg";

export const LUXIMMO_CONFIG: SiteConfig = {
  name: "Luximmo",
  baseUrl: BASE_URL,
  encoding: "windows-1251",
  sourceType: "html",
  rateLimitMs: 1500,
  maxPages: 100,
  locationFormat: { delimiter: /\s*,\s*/, order: "city-first" },
};

const CARD_SELECTOR = "div.card.mb-4";

function totalOffers($: CheerioAPI): number | null {
  const match = parseText($.root(), "div.found-properties")?.match(/(\d[\d\s]*)\s*оферт/);
  return match ? parseNumber(match[1]) : null;
}

function offerWord(title: string, detailsUrl: string): string | null {
  const haystack = `${title} ${detailsUrl}`.toLowerCase();
  if (/продава|prodava|prodazhba/.test(haystack)) return "Продава";
  if (/наем|naem/.test(haystack)) return "Наем";
  return null;
}

function numPhotos(card: Cheerio<Element>): number {
  const counter = parseText(card, ".counter-wrapper-card .lastNum");
  if (counter && /^\d+$/.test(counter)) return parseInt(counter, 10);
  const slides = card.find("div.slick-slide").length;
  if (slides > 0) return slides;
  return card.find("div.carousel-item, div.card-img").length;
}

function* extractListings($: CheerioAPI, ctx: PageContext): Generator<RawListing> {
  const cards = $(CARD_SELECTOR);
  const offers = totalOffers($);
  if (cards.length === 0 && offers === null) {
    throw new ExtractionError("Luximmo: page has no result list", {
      site: "Luximmo",
      url: ctx.searchUrl,
    });
  }

  for (const el of cards.toArray()) {
    const card = $(el);
    const detailsUrl = resolveUrl(parseAttr(card, "a.card-url", "href"), BASE_URL);
    if (!detailsUrl) continue;

    const heading = parseText(card, "h4.card-title") ?? "";
    const offer = offerWord(heading, detailsUrl);
    const title = offer && !heading.toLowerCase().includes(offer.toLowerCase()) ? `${offer} ${heading}` : heading;

    const euro = parseText(card, ".card-price")?.match(/([\d\s]+)\s*€/);
    const loc = card.find(".card-loc-dis .text-dark").first();
    const locationText = cleanText(loc.text().replace("карта", ""));
    const details = parseText(card, ".card-dis") ?? "";
    const badges = card
      .find(".badge-rights, .card-badge")
      .toArray()
      .map((badge) => cleanText($(badge).text()))
      .filter((text) => text.length > 0);

    yield createRawListing({
      site: "Luximmo",
      detailsUrl,
      searchUrl: ctx.searchUrl,
      priceText: euro ? `${euro[1].trim()} €` : null,
      locationText: locationText.length > 0 ? locationText : null,
      title: title.trim().length > 0 ? title.trim() : null,
      areaText: details.match(/Площ:\s*([\d.,]+\s*м)/)?.[1] ?? null,
      floorText: details.match(/Етаж:\s*(\d+)/)?.[1] ?? null,
      totalFloorsText: details.match(/Етажност:\s*(\d+)/)?.[1] ?? null,
      description: badges.length > 0 ? badges.join(", ") : null,
      agencyName: "Luximmo",
      numPhotos: numPhotos(card),
      refNo: detailsUrl.match(/imot-(\d+)/)?.[1] ?? null,
      totalOffers: offers,
      scrapedAt: ctx.scrapedAt,
    });
  }
}

function lastPage($: CheerioAPI): number {
  let last = 1;
  for (const el of $("ul.pagination a.page-link").toArray()) {
    const link = $(el);
    const index = link.attr("href")?.match(/index(\d+)\.html/)?.[1];
    if (index) last = Math.max(last, parseInt(index, 10) + 1);
    const label = link.text().trim();
    if (/^\d+$/.test(label)) last = Math.max(last, parseInt(label, 10));
  }
  return last;
}

function getNextPageUrl($: CheerioAPI, currentUrl: string, pageNumber: number): string | null {
  if ($(`${CARD_SELECTOR} a.card-url`).length === 0) return null;
  if (pageNumber > lastPage($)) return null;

  const file = pageNumber > 1 ? `index${pageNumber - 1}.html` : "index.html";
  if (/index\d*\.html/.test(currentUrl)) {
    return currentUrl.replace(/index\d*\.html/, file);
  }
  return `${currentUrl.replace(/\/+$/, "")}/${file}`;
}

export const luximmoAdapter = createHtmlAdapter({
  config: LUXIMMO_CONFIG,
  extractListings,
  getNextPageUrl,
});
