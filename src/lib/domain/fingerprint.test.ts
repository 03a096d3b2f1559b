import { describe, expect, it } from "vitest";
import { computeFingerprint, fingerprintKey, listingIdFromUrl } from "./fingerprint";
import { createHash } from "crypto";

describe("listingIdFromUrl", () => {
  it("prefers the adv or id query parameter", () => {
    expect(
      listingIdFromUrl("https://www.imot.bg/pcgi/imot.cgi?act=5&adv=1c171234567890&slink=abc")
    ).toBe("1c171234567890");
    expect(listingIdFromUrl("https://www.imoti.net/bg/obiava?id=55512")).toBe("55512");
  });

  it("uses the last long digit run of the last path segment", () => {
    expect(
      listingIdFromUrl(
        "https://www.homes.bg/offer/apartament-za-prodazhba/dvustaen-65m2-sofiya-lozenets/as1234567"
      )
    ).toBe("1234567");
    expect(listingIdFromUrl("https://www.alo.bg/obiava/8123456-dvustaen")).toBe("8123456");
  });

  it("falls back to the lower-cased path", () => {
    expect(listingIdFromUrl("https://example.bg/Offers/Lozenets-Flat/")).toBe(
      "/offers/lozenets-flat"
    );
    expect(listingIdFromUrl("not a url/")).toBe("not a url");
  });
});

describe("computeFingerprint", () => {
  const base = {
    site: "ImotBg",
    city: "Sofia",
    neighborhood: "Lozenets",
    propertyType: "one-bedroom",
    price: 150000,
    area: 65,
    detailsUrl: "https://www.imot.bg/obiava?adv=12345678",
  };

  it("hashes the pipe-joined canonical tuple", () => {
    expect(fingerprintKey(base)).toBe(
      "ImotBg|Sofia|Lozenets|one-bedroom|150000.00|65.00|12345678"
    );
    expect(computeFingerprint(base)).toBe(
      "9082bba3e8b1a627895c4d423b533261c33aefc3c6387fd89e4638c1b8681049"
    );
  });

  it("writes absent price and area as empty", () => {
    expect(fingerprintKey({ ...base, price: null, area: null })).toBe(
      "ImotBg|Sofia|Lozenets|one-bedroom|||12345678"
    );
  });

  it("changes when price or area changes", () => {
    const original = computeFingerprint(base);
    expect(computeFingerprint({ ...base, price: 150001 })).not.toBe(original);
    expect(computeFingerprint({ ...base, area: 66 })).not.toBe(original);
  });

  it("is the SHA-256 hex of the key", () => {
    expect(computeFingerprint(base)).toBe(
      createHash("sha256").update(fingerprintKey(base)).digest("hex")
    );
  });
});
