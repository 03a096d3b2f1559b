import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { parse } from "csv-parse/sync";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { runCommand, type RunContext } from "./run";
import { Transformer } from "./transform";
import { parseArgs } from "../cli";
import type { PageFetcher } from "../http/pageFetcher";
import { createNotifier, type MailSender } from "../notify/mailtrap";
import { fixedClock } from "@/lib/clock";

const SEARCH_URL = "https://www.imot.bg/obiavi/prodazhbi/grad-sofiya";

function imotBgPage(price: string): string {
  return `<html><body>
<span class="pageNumbersInfo">Обяви 1-1 от общо 1</span>
<div class="item" id="ida12345678">
  <a class="title" href="//www.imot.bg/obiava-1a12345678-prodava-dvustaen">Продава 2-СТАЕН <location>град София, Лозенец</location></a>
  <div class="price"><div>${price}</div></div>
  <div class="info">65 кв.м, 3-ти ет. от 6</div>
</div>
</body></html>`;
}

function fetcherReturning(body: string): PageFetcher & { urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    async fetch(url) {
      urls.push(url);
      return body;
    },
  };
}

const RowsSchema = z.array(z.record(z.string()));

function readRows(filePath: string): Array<Record<string, string>> {
  return RowsSchema.parse(parse(fs.readFileSync(filePath, "utf-8"), { columns: true }));
}

describe("runCommand", () => {
  let dir: string;
  let configPath: string;
  let sender: MailSender;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "imotscope-run-"));
    configPath = path.join(dir, "url_configs.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        ImotBg: { urls: [{ url: SEARCH_URL, name: "Sofia" }] },
        ImotiNet: { urls: "not a list" },
      })
    );
    sender = { send: vi.fn().mockResolvedValue({ success: true }) };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function context(argv: string[], fetcher: PageFetcher): RunContext {
    const args = parseArgs(argv);
    return {
      args,
      resultsDir: args.resultsDir ?? path.join(dir, "results"),
      configPath: args.configPath ?? configPath,
      fetcher,
      transformer: new Transformer(),
      notifier: createNotifier(
        { kind: "mailtrap", token: "test-secret", sender: "a@example.com", recipient: "b@example.com" },
        sender
      ),
      clock: fixedClock("2024-05-01T12:00:00"),
    };
  }

  it("keeps going when one site's config is bad", async () => {
    const fetcher = fetcherReturning(imotBgPage("150 000 €"));
    const { exitCode, summaries } = await runCommand(context(["scrape", "--pages", "1"], fetcher));

    expect(exitCode).toBe(0);
    expect(fetcher.urls).toEqual([SEARCH_URL]);
    expect(summaries.map((s) => s.site)).toEqual([
      "ImotBg",
      "ImotiNet",
      "HomesBg",
      "Suprimmo",
      "AloBg",
      "BazarBg",
      "ImotiCom",
      "BulgarianProperties",
      "Luximmo",
    ]);
    expect(summaries.every((s) => s.fatal === null)).toBe(true);
    expect(summaries[0]).toMatchObject({ fetched: 1, transformed: 1, filesWritten: 2 });
    expect(summaries[1]).toMatchObject({ urlsAttempted: 0, filesWritten: 0 });
    expect(sender.send).not.toHaveBeenCalled();
  });

  it("reprocesses a raw file rewritten by a same-day scrape", async () => {
    const argv = ["scrape", "--site", "ImotBg", "--pages", "1"];
    await runCommand(context(argv, fetcherReturning(imotBgPage("100 000 €"))));
    const { summaries } = await runCommand(context(argv, fetcherReturning(imotBgPage("200 000 €"))));

    const processed = path.join(dir, "results", "processed", "ImotBg", "sofia", "2024-05-01.csv");
    expect(summaries[0].filesWritten).toBe(2);
    expect(readRows(processed).map((row) => [row.price, row.original_currency])).toEqual([
      ["200000", "EUR"],
    ]);
  });

  it("notifies and fails when a site cannot write its output", async () => {
    const blocked = path.join(dir, "blocked");
    fs.writeFileSync(blocked, "");
    const { exitCode, summaries } = await runCommand(
      context(
        ["download", "--site", "ImotBg", "--pages", "1", "--result-folder", blocked],
        fetcherReturning(imotBgPage("150 000 €"))
      )
    );

    expect(exitCode).toBe(1);
    expect(summaries[0].fatal).toMatch(/^Cannot write /);
    expect(sender.send).toHaveBeenCalledTimes(1);
    expect(vi.mocked(sender.send).mock.calls[0][0].subject).toBe("imotscope download: 1 site(s) failed");
  });

  it("notifies and fails when the search config file is missing", async () => {
    const fetcher = fetcherReturning(imotBgPage("150 000 €"));
    const { exitCode, summaries } = await runCommand(
      context(["download", "--site", "ImotBg", "--config", path.join(dir, "missing.json")], fetcher)
    );

    expect(exitCode).toBe(1);
    expect(summaries[0].fatal).toMatch(/^Cannot read /);
    expect(fetcher.urls).toEqual([]);
    expect(sender.send).toHaveBeenCalledTimes(1);
  });
});
