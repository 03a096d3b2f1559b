import { describe, expect, it } from "vitest";
import { imotiComAdapter } from "./imoticom";
import { ExtractionError } from "@/lib/errors";

const SEARCH_URL = "https://www.imoti.com/prodazhbi/grad-sofiya/apartamenti";
const CTX = { searchUrl: SEARCH_URL, scrapedAt: "2024-05-01T10:00:00.000+03:00" };

const PAGE = `<html><body>
<div class="list">
  <div class="item">
    <div class="photo"><img src="1.jpg"><img src="2.jpg"></div>
    <span class="type">Продава Тристаен апартамент</span>
    <span class="price">210 000 EUR</span>
    <div class="info">
      <div class="location">град София, Младост 1<br>95 кв.м, етаж 4</div>
      Южно изложение, след ремонт
      <a href="/obiava/7654321/prodava-tristaen">Виж повече</a>
    </div>
  </div>
</div>
<a class="big" href="/prodazhbi/grad-sofiya/apartamenti/page-5">Последна</a>
</body></html>`;

describe("imotiComAdapter", () => {
  it("splits the location block into location and details", () => {
    const [listing] = [...imotiComAdapter.loadPage(PAGE, CTX).extractListings()];

    expect(listing).toEqual({
      site: "ImotiCom",
      detailsUrl: "https://www.imoti.com/obiava/7654321/prodava-tristaen",
      searchUrl: SEARCH_URL,
      priceText: "210 000 EUR",
      locationText: "град София, Младост 1",
      title: "Продава Тристаен апартамент",
      areaText: "95 кв.м",
      floorText: "етаж 4",
      totalFloorsText: null,
      description: "Южно изложение, след ремонт",
      agencyName: null,
      numPhotos: 2,
      refNo: "7654321",
      totalOffers: null,
      scrapedAt: CTX.scrapedAt,
    });
  });

  it("puts the page segment before the query string", () => {
    const page = imotiComAdapter.loadPage(PAGE, CTX);
    expect(page.getNextPageUrl(SEARCH_URL, 2)).toBe(`${SEARCH_URL}/page-2`);
    expect(page.getNextPageUrl(`${SEARCH_URL}/page-2?sort=price`, 3)).toBe(`${SEARCH_URL}/page-3?sort=price`);
    expect(page.getNextPageUrl(`${SEARCH_URL}/page-5`, 6)).toBeNull();
  });

  it("accepts an empty list and rejects a page without one", () => {
    const empty = imotiComAdapter.loadPage('<html><body><div class="list"></div></body></html>', CTX);
    expect([...empty.extractListings()]).toEqual([]);

    const blocked = imotiComAdapter.loadPage("<html><body><p>Service unavailable</p></body></html>", CTX);
    expect(() => [...blocked.extractListings()]).toThrow(ExtractionError);
  });
});
