import { describe, expect, it } from "vitest";
import {
  cleanText,
  loadHtml,
  parseAllText,
  parseAttr,
  parseNumber,
  parseSpacedText,
  parseText,
  resolveUrl,
} from "./parse";

const $ = loadHtml(`<div id="root">
  <h3>  Двустаен
     апартамент </h3>
  <ul><li>3-ти етаж</li><li> </li><li>Тухла</li></ul>
  <div class="price">150 000 €<br>293 374 лв.</div>
  <a class="link" href=" /obiava/1 ">Виж</a>
</div>`);
const root = $("#root");

describe("html parse helpers", () => {
  it("cleans whitespace", () => {
    expect(cleanText("  a \n\t b c ")).toBe("a b c");
  });

  it("reads text, skipping empty matches", () => {
    expect(parseText(root, "h3")).toBe("Двустаен апартамент");
    expect(parseText(root, "h4")).toBeNull();
    expect(parseAllText(root, "li")).toEqual(["3-ти етаж", "Тухла"]);
  });

  it("keeps <br>-separated parts apart", () => {
    expect(parseText(root, "div.price")).toBe("150 000 €293 374 лв.");
    expect(parseSpacedText(root, "div.price")).toBe("150 000 € 293 374 лв.");
  });

  it("reads trimmed attributes", () => {
    expect(parseAttr(root, "a.link", "href")).toBe("/obiava/1");
    expect(parseAttr(root, "a.link", "title")).toBeNull();
  });

  it("parses grouped integers", () => {
    expect(parseNumber("1 234 обяви")).toBe(1234);
    expect(parseNumber("12 снимки")).toBe(12);
    expect(parseNumber("няма")).toBeNull();
    expect(parseNumber(null)).toBeNull();
  });

  it("resolves links against the site", () => {
    expect(resolveUrl("/obiava/1", "https://www.imot.bg")).toBe("https://www.imot.bg/obiava/1");
    expect(resolveUrl("//www.imot.bg/x", "https://www.imot.bg")).toBe("https://www.imot.bg/x");
    expect(resolveUrl("", "https://www.imot.bg")).toBeNull();
    expect(resolveUrl(null, "https://www.imot.bg")).toBeNull();
  });
});
