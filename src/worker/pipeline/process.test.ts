import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { processUnprocessed, reprocess } from "./process";
import { Transformer } from "./transform";
import { writeRawCsv } from "../storage/csv";
import { rawFilePath } from "../storage/paths";
import { fixedClock } from "@/lib/clock";
import { createRawListing } from "@/lib/domain/types";

const clock = fixedClock("2024-05-03T12:00:00");

function listing(id: string, scrapedAt: string) {
  return createRawListing({
    site: "ImotBg",
    detailsUrl: `https://www.imot.bg/obiava-1a${id}-prodava-dvustaen-apartament`,
    priceText: "150 000 лв",
    locationText: "София, Лозенец",
    title: "Продава 2-СТАЕН",
    areaText: "65 кв.м",
    scrapedAt,
  });
}

const RowsSchema = z.array(z.record(z.string()));

function readRows(filePath: string): Array<Record<string, string>> {
  return RowsSchema.parse(parse(fs.readFileSync(filePath, "utf-8"), { columns: true }));
}

describe("processor", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "imotscope-process-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("processes new raw files once, collapsing duplicates", () => {
    const rawPath = rawFilePath(dir, "ImotBg", "sofia", "2024-05-01");
    writeRawCsv(rawPath, [
      listing("11111111", "2024-05-01T10:00:00+03:00"),
      listing("11111111", "2024-05-01T10:05:00+03:00"),
      listing("22222222", "2024-05-01T10:00:00+03:00"),
    ]);

    const first = processUnprocessed("ImotBg", { resultsDir: dir, transformer: new Transformer() });
    const outPath = path.join(dir, "processed", "ImotBg", "sofia", "2024-05-01.csv");

    expect(first.files).toEqual([outPath]);
    expect(first.summary).toMatchObject({ transformed: 3, duplicates: 1, filesWritten: 1 });
    const rows = readRows(outPath);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toMatchObject({
      price: "76693.78",
      original_currency: "BGN",
      city: "Sofia",
      neighborhood: "Lozenets",
      property_type: "one-bedroom",
      offer_type: "sale",
      area: "65",
      floor: "",
      scraped_at: "2024-05-01T10:00:00+03:00",
    });

    const second = processUnprocessed("ImotBg", { resultsDir: dir, transformer: new Transformer() });
    expect(second.files).toEqual([]);
  });

  it("produces identical output when reprocessed in place", () => {
    const rawPath = rawFilePath(dir, "ImotBg", "sofia", "2024-05-01");
    writeRawCsv(rawPath, [listing("11111111", "2024-05-01T10:00:00+03:00")]);
    const opts = { resultsDir: dir, transformer: new Transformer(), clock };

    const [outPath] = reprocess("ImotBg", { kind: "all" }, { ...opts, output: "overwrite" }).files;
    const before = fs.readFileSync(outPath, "utf-8");
    reprocess("ImotBg", { kind: "all" }, { ...opts, output: "overwrite" });

    expect(fs.readFileSync(outPath, "utf-8")).toBe(before);
  });

  it("writes timestamped copies in new mode", () => {
    const rawPath = rawFilePath(dir, "ImotBg", "sofia", "2024-05-01");
    writeRawCsv(rawPath, [listing("11111111", "2024-05-01T10:00:00+03:00")]);

    const { files } = reprocess(
      "ImotBg",
      { kind: "file", path: rawPath },
      { resultsDir: dir, transformer: new Transformer(), output: "new", clock }
    );

    expect(files).toEqual([
      path.join(dir, "processed", "ImotBg", "sofia", "2024-05-01_reprocessed_2024-05-03_12-00-00.csv"),
    ]);
  });

  it("merges a folder keeping the earliest row", () => {
    writeRawCsv(rawFilePath(dir, "ImotBg", "sofia", "2024-05-02"), [
      listing("11111111", "2024-05-02T10:00:00+03:00"),
    ]);
    writeRawCsv(rawFilePath(dir, "ImotBg", "sofia", "2024-05-01"), [
      listing("11111111", "2024-05-01T10:00:00+03:00"),
      listing("22222222", "2024-05-01T10:00:00+03:00"),
    ]);

    const { files, summary } = reprocess(
      "ImotBg",
      { kind: "folder", folder: "sofia" },
      { resultsDir: dir, transformer: new Transformer(), output: "merge", clock }
    );

    const merged = path.join(dir, "processed", "ImotBg", "sofia", "merged_2024-05-03_12-00-00.csv");
    expect(files).toEqual([merged]);
    expect(summary.duplicates).toBe(1);
    const rows = readRows(merged);
    expect(rows.map((row) => row.scraped_at)).toEqual([
      "2024-05-01T10:00:00+03:00",
      "2024-05-01T10:00:00+03:00",
    ]);
  });

  it("writes nothing for an empty target", () => {
    const { files } = reprocess(
      "ImotBg",
      { kind: "folder", folder: "missing" },
      { resultsDir: dir, transformer: new Transformer(), output: "merge", clock }
    );
    expect(files).toEqual([]);
  });

  it("counts rows without a details URL as dropped", () => {
    const rawPath = rawFilePath(dir, "ImotBg", "sofia", "2024-05-01");
    fs.mkdirSync(path.dirname(rawPath), { recursive: true });
    fs.writeFileSync(
      rawPath,
      "site,details_url,price_text,scraped_at\n" +
        "ImotBg,https://www.imot.bg/obiava-1a11111111,150 000 €,2024-05-01T10:00:00+03:00\n" +
        "ImotBg,,120 000 €,2024-05-01T10:00:00+03:00\n"
    );

    const { summary } = processUnprocessed("ImotBg", { resultsDir: dir, transformer: new Transformer() });

    expect(summary).toMatchObject({ transformed: 1, dropped: 1, filesWritten: 1 });
  });
});
