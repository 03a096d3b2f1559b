import { describe, expect, it } from "vitest";
import { bulgarianPropertiesAdapter } from "./bulgarianproperties";
import { ExtractionError } from "@/lib/errors";

const SEARCH_URL = "https://www.bulgarianproperties.bg/imoti-apartamenti/grad-sofiya/?page=1";
const CTX = { searchUrl: SEARCH_URL, scrapedAt: "2024-05-01T10:00:00.000+03:00" };

const DETAILS = "/imoti-apartamenti/imot-89171-dvustaen-apartament-za-prodajba.html";

const PAGE = `<html><body>
<div class="component-property-item">
  <div class="property-item-top"><a class="image" href="${DETAILS}"><img src="1.jpg"><img src="2.jpg"><img src="3.jpg"></a></div>
  <div class="content">
    <a class="title" href="${DETAILS}">Двустаен апартамент за продажба</a>
    <div class="location">Лозенец, София</div>
    <div class="size">Площ: 72 м2 Етаж: 5</div>
    <div class="regular-price">139 000 €</div>
    <div class="new-price">129 000 €</div>
    <div class="list-description">Светъл апартамент до метро</div>
  </div>
</div>
<div class="component-property-item">
  <div class="content">
    <a class="title" href="/imoti-kashti/12345.html">Къща в село</a>
    <div class="size">95 кв. м</div>
    <div class="regular-price">80 000 €</div>
    <div class="broker"><div class="broker-info"><span class="name">Иван Петров</span></div></div>
  </div>
</div>
<div class="pagination"><a class="page" href="?page=2">2</a><a class="page" href="?page=4">4</a><a href="?page=2">Напред</a></div>
</body></html>`;

describe("bulgarianPropertiesAdapter", () => {
  it("extracts listing fields", () => {
    const listings = [...bulgarianPropertiesAdapter.loadPage(PAGE, CTX).extractListings()];

    expect(listings).toEqual([
      {
        site: "BulgarianProperties",
        detailsUrl: `https://www.bulgarianproperties.bg${DETAILS}`,
        searchUrl: SEARCH_URL,
        priceText: "129 000 €",
        locationText: "Лозенец, София",
        title: "Двустаен апартамент за продажба",
        areaText: "72 м2",
        floorText: "5",
        totalFloorsText: null,
        description: "Светъл апартамент до метро",
        agencyName: "Bulgarian Properties",
        numPhotos: 3,
        refNo: "89171",
        totalOffers: null,
        scrapedAt: CTX.scrapedAt,
      },
      {
        site: "BulgarianProperties",
        detailsUrl: "https://www.bulgarianproperties.bg/imoti-kashti/12345.html",
        searchUrl: SEARCH_URL,
        priceText: "80 000 €",
        locationText: null,
        title: "Къща в село",
        areaText: "95 кв. м",
        floorText: null,
        totalFloorsText: null,
        description: null,
        agencyName: "Иван Петров",
        numPhotos: 0,
        refNo: "12345",
        totalOffers: null,
        scrapedAt: CTX.scrapedAt,
      },
    ]);
  });

  it("pages by the page parameter up to the highest linked page", () => {
    const page = bulgarianPropertiesAdapter.loadPage(PAGE, CTX);
    const base = "https://www.bulgarianproperties.bg/imoti-apartamenti/grad-sofiya/";
    expect(page.getNextPageUrl(SEARCH_URL, 2)).toBe(`${base}?page=2`);
    expect(page.getNextPageUrl(base, 3)).toBe(`${base}?page=3`);
    expect(page.getNextPageUrl(`${base}?page=4`, 5)).toBeNull();
  });

  it("rejects a page without a result list", () => {
    const page = bulgarianPropertiesAdapter.loadPage("<html><body><h1>502 Bad Gateway</h1></body></html>", CTX);
    expect(() => [...page.extractListings()]).toThrow(ExtractionError);
  });
});
