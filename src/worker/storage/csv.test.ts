import { describe, expect, it } from "vitest";
import { listingsToCsv, parseRawCsv, rawListingsToCsv } from "./csv";
import { createRawListing, type ListingData } from "@/lib/domain/types";

describe("raw CSV", () => {
  it("writes the header and empty cells for absent values", () => {
    const csv = rawListingsToCsv([
      createRawListing({
        site: "ImotBg",
        detailsUrl: "https://www.imot.bg/obiava-1",
        title: "Двустаен",
        numPhotos: 4,
        scrapedAt: "2024-05-01T10:00:00+03:00",
      }),
    ]);

    expect(csv).toBe(
      "site,details_url,search_url,price_text,location_text,title,area_text,floor_text," +
        "total_floors_text,description,agency_name,num_photos,ref_no,total_offers,scraped_at\n" +
        "ImotBg,https://www.imot.bg/obiava-1,,,,Двустаен,,,,,,4,,,2024-05-01T10:00:00+03:00\n"
    );
  });

  it("reads back quoted text and numbers", () => {
    const original = createRawListing({
      site: "ImotBg",
      detailsUrl: "https://www.imot.bg/obiava-1",
      description: 'Тухла, "ново"\nстроителство',
      numPhotos: 12,
      totalOffers: 1234,
      scrapedAt: "2024-05-01T10:00:00+03:00",
    });

    expect(parseRawCsv(rawListingsToCsv([original]))).toEqual([original]);
  });

  it("keeps rows without a details URL for the transformer to drop", () => {
    const csv = "site,details_url,scraped_at\nImotBg,,2024-05-01\nImotBg,https://x.bg/1,2024-05-01\n";
    const rows = parseRawCsv(csv);
    expect(rows.map((row) => row.detailsUrl)).toEqual(["", "https://x.bg/1"]);
    expect(rows[1].priceText).toBeNull();
  });
});

describe("processed CSV", () => {
  it("writes numbers, named floors and empty cells", () => {
    const listing: ListingData = {
      site: "ImotBg",
      detailsUrl: "https://www.imot.bg/obiava-1",
      searchUrl: null,
      price: 76693.78,
      originalCurrency: "BGN",
      pricePerM2: 1179.9,
      city: "Sofia",
      neighborhood: "Lozenets",
      propertyType: "one-bedroom",
      offerType: "sale",
      area: 65,
      floor: "ground",
      totalFloors: 6,
      rawTitle: null,
      rawLocation: null,
      agency: null,
      numPhotos: null,
      refNo: null,
      scrapedAt: "2024-05-01T10:00:00+03:00",
      fingerprintHash: "abc",
    };

    const [, row] = listingsToCsv([listing]).split("\n");
    expect(row).toBe(
      "ImotBg,https://www.imot.bg/obiava-1,,76693.78,BGN,1179.9,Sofia,Lozenets,one-bedroom,sale," +
        "65,ground,6,,,,,,2024-05-01T10:00:00+03:00,abc"
    );
  });
});
