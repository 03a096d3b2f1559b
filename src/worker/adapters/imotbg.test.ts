import { describe, expect, it } from "vitest";
import { imotBgAdapter } from "./imotbg";
import { ExtractionError } from "@/lib/errors";

const CTX = {
  searchUrl: "https://www.imot.bg/obiavi/prodazhbi/grad-sofiya",
  scrapedAt: "2024-05-01T10:00:00.000+03:00",
};

const PAGE = `<html><body>
<span class="pageNumbersInfo">Обяви 1-2 от общо 1 234</span>
<div class="item" id="ida12345678">
  <a class="title" href="//www.imot.bg/obiava-1a12345678-prodava-dvustaen-apartament-grad-sofiya-lozenets">Продава 2-СТАЕН <location>град София, Лозенец</location></a>
  <div class="price"><div>150 000 €<br>293 374.50 лв.</div></div>
  <div class="info">65 кв.м, 3-ти ет. от 6, Тухла, 2010 г.</div>
  <div class="seller"><div class="name">Явлена</div></div>
  <a class="photos">12 снимки</a>
</div>
<div class="item" id="idb999"><span>no link</span></div>
</body></html>`;

describe("imotBgAdapter", () => {
  it("extracts listing fields", () => {
    const listings = [...imotBgAdapter.loadPage(PAGE, CTX).extractListings()];

    expect(listings).toHaveLength(1);
    expect(listings[0]).toEqual({
      site: "ImotBg",
      detailsUrl:
        "https://www.imot.bg/obiava-1a12345678-prodava-dvustaen-apartament-grad-sofiya-lozenets",
      searchUrl: CTX.searchUrl,
      priceText: "150 000 € 293 374.50 лв.",
      locationText: "град София, Лозенец",
      title: "Продава 2-СТАЕН",
      areaText: "65 кв.м",
      floorText: "3-ти ет. от 6",
      totalFloorsText: null,
      description: "65 кв.м, 3-ти ет. от 6, Тухла, 2010 г.",
      agencyName: "Явлена",
      numPhotos: 12,
      refNo: "12345678",
      totalOffers: 1234,
      scrapedAt: CTX.scrapedAt,
    });
  });

  it("restarts extraction on every call", () => {
    const page = imotBgAdapter.loadPage(PAGE, CTX);
    expect([...page.extractListings()]).toHaveLength(1);
    expect([...page.extractListings()]).toHaveLength(1);
  });

  it("rejects a page without a result list", () => {
    const page = imotBgAdapter.loadPage("<html><body><p>Captcha</p></body></html>", CTX);
    expect(() => [...page.extractListings()]).toThrow(ExtractionError);
  });

  it("accepts an empty result page", () => {
    const html = `<html><body><span class="pageNumbersInfo">Обяви 0</span></body></html>`;
    const page = imotBgAdapter.loadPage(html, CTX);
    expect([...page.extractListings()]).toEqual([]);
    expect(page.getNextPageUrl(CTX.searchUrl, 2)).toBeNull();
  });

  it("builds /p-N page URLs", () => {
    const page = imotBgAdapter.loadPage(PAGE, CTX);
    expect(page.getNextPageUrl("https://www.imot.bg/obiavi/prodazhbi/grad-sofiya?sort=1", 2)).toBe(
      "https://www.imot.bg/obiavi/prodazhbi/grad-sofiya/p-2?sort=1"
    );
    expect(page.getNextPageUrl("https://www.imot.bg/obiavi/prodazhbi/grad-sofiya/p-2", 3)).toBe(
      "https://www.imot.bg/obiavi/prodazhbi/grad-sofiya/p-3"
    );
  });

  it("builds one target per configured URL", () => {
    expect(
      imotBgAdapter.buildUrls({
        urls: [
          { url: "https://www.imot.bg/a", name: "Sofia" },
          { url: "https://www.imot.bg/b", name: "Sofia" },
          { url: "https://www.imot.bg/c" },
        ],
      })
    ).toEqual([
      { url: "https://www.imot.bg/a", name: "Sofia", folder: "sofia" },
      { url: "https://www.imot.bg/b", name: "Sofia", folder: "sofia-2" },
      { url: "https://www.imot.bg/c", name: "search-3", folder: "search-3" },
    ]);
    expect(imotBgAdapter.buildUrls({ urls: [] })).toEqual([]);
    expect(() => imotBgAdapter.buildUrls({})).toThrow("no \"urls\"");
  });
});
