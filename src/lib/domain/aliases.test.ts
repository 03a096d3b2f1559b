import { describe, expect, it } from "vitest";
import {
  AGENCY_ALIASES,
  AliasTable,
  CITY_ALIASES,
  CURRENCY_MARKERS,
  OFFER_TYPE_ALIASES,
  PROPERTY_TYPE_ALIASES,
} from "./aliases";

describe("AliasTable", () => {
  const table = new AliasTable<string>([
    ["Mladost", ["младост"]],
    ["Mladost 1", ["младост 1"]],
  ]);

  it("matches the whole text first", () => {
    expect(table.match("  Младост ")).toBe("Mladost");
  });

  it("falls back to the longest contained alias", () => {
    expect(table.match("младост 1 - ул. тестова")).toBe("Mladost 1");
    expect(table.match("близо до младост")).toBe("Mladost");
  });

  it("registers the canonical name as an alias", () => {
    expect(table.matchExact("mladost 1")).toBe("Mladost 1");
  });

  it("returns null for no match", () => {
    expect(table.match("лозенец")).toBeNull();
    expect(table.match(null)).toBeNull();
    expect(table.matchExact("младост 1 - ул. тестова")).toBeNull();
  });
});

describe("shipped tables", () => {
  it("resolves cities in Cyrillic and Latin", () => {
    expect(CITY_ALIASES.match("София")).toBe("Sofia");
    expect(CITY_ALIASES.match("grad-plovdiv")).toBe("Plovdiv");
  });

  it("resolves property types by keyword", () => {
    expect(PROPERTY_TYPE_ALIASES.match("Продава 2-СТАЕН")).toBe("one-bedroom");
    expect(PROPERTY_TYPE_ALIASES.match("Продава ЕДНОСТАЕН")).toBe("studio");
    expect(PROPERTY_TYPE_ALIASES.match("Продава МНОГОСТАЕН")).toBe("multi-bedroom");
    expect(PROPERTY_TYPE_ALIASES.match("Продава ЧЕТИРИСТАЕН")).toBe("three-bedroom");
  });

  it("resolves offer types by keyword", () => {
    expect(OFFER_TYPE_ALIASES.match("Дава под наем 3-стаен")).toBe("rent");
    expect(OFFER_TYPE_ALIASES.match("Продава 3-стаен")).toBe("sale");
  });

  it("canonicalizes agencies by exact name only", () => {
    expect(AGENCY_ALIASES.matchExact("  Century21 ")).toBe("Century 21");
    expect(AGENCY_ALIASES.matchExact("Тестови имоти")).toBeNull();
  });

  it("maps currency markers", () => {
    expect(CURRENCY_MARKERS.get("лв")).toBe("BGN");
    expect(CURRENCY_MARKERS.get("€")).toBe("EUR");
  });
});
