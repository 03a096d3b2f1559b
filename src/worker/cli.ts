import { SITE_NAMES, isSiteName, type SiteName } from "./adapters/SourceAdapter";
import { REPROCESS_OUTPUTS, type ReprocessOutput, type ReprocessTarget } from "./pipeline/process";

export const COMMANDS = ["download", "process", "scrape", "reprocess", "fetch"] as const;
export type Command = (typeof COMMANDS)[number];

export const USAGE = `Usage: imotscope <command> [options]

Commands:
  download    Fetch search results into results/raw
  process     Normalize raw files that have no processed counterpart
  scrape      download, then process
  reprocess   Re-run normalization over stored raw files
  fetch       Fetch one URL and print the normalized listings

Options:
  --site <name|all>        ${SITE_NAMES.join(", ")} (default: all)
  --result-folder <dir>    Results root (default: $RESULTS_DIR or results)
  --pages <n>              Page cap per search URL
  --config <file>          Search config (default: $URL_CONFIGS_PATH or url_configs.json)
  --file <path>            process/reprocess: a single raw CSV
  --folder <name>          reprocess: one search folder
  --all                    reprocess: every raw file of the site
  --output <mode|path>     reprocess: overwrite | new | merge; fetch: CSV path
  --url <url>              fetch: the search URL
  --full                   fetch: print every column
  --save                   fetch: also write a processed CSV`;

/** Bad command line. The CLI prints usage and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliArgs {
  command: Command;
  sites: SiteName[];
  resultsDir?: string;
  configPath?: string;
  pages?: number;
  /** process --file */
  file?: string;
  /** reprocess */
  reprocessTarget?: ReprocessTarget;
  reprocessOutput: ReprocessOutput;
  /** fetch */
  url?: string;
  full: boolean;
  save: boolean;
  outputPath?: string;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isReprocessOutput(value: string): value is ReprocessOutput {
  return REPROCESS_OUTPUTS.some((output) => output === value);
}

/** Parse CLI args */
export function parseArgs(argv: string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!command || !isCommand(command)) {
    throw new UsageError(command ? `Unknown command: ${command}` : "Missing command");
  }

  const values = new Map<string, string>();
  const flags = new Set<string>();
  const VALUE_OPTIONS = ["--site", "--result-folder", "--pages", "--config", "--file", "--folder", "--output", "--url"];
  const FLAG_OPTIONS = ["--all", "--full", "--save"];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (VALUE_OPTIONS.includes(arg)) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new UsageError(`${arg} needs a value`);
      }
      values.set(arg, value);
      i++;
    } else if (FLAG_OPTIONS.includes(arg)) {
      flags.add(arg);
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  const siteArg = values.get("--site") ?? "all";
  let sites: SiteName[];
  if (siteArg === "all") {
    sites = [...SITE_NAMES];
  } else if (isSiteName(siteArg)) {
    sites = [siteArg];
  } else {
    throw new UsageError(`Unknown site: ${siteArg}. Available: ${SITE_NAMES.join(", ")}`);
  }

  let pages: number | undefined;
  const pagesArg = values.get("--pages");
  if (pagesArg !== undefined) {
    pages = Number(pagesArg);
    if (!Number.isInteger(pages) || pages < 1) {
      throw new UsageError(`--pages must be a positive integer, got ${pagesArg}`);
    }
  }

  const needsOneSite = command === "reprocess" || command === "fetch" || (command === "process" && values.has("--file"));
  if (needsOneSite && sites.length !== 1) {
    throw new UsageError(`${command} needs --site <name>`);
  }

  const args: CliArgs = {
    command,
    sites,
    resultsDir: values.get("--result-folder"),
    configPath: values.get("--config"),
    pages,
    reprocessOutput: "overwrite",
    full: flags.has("--full"),
    save: flags.has("--save"),
  };

  if (command === "reprocess") {
    const file = values.get("--file");
    const folder = values.get("--folder");
    const chosen = [file !== undefined, folder !== undefined, flags.has("--all")].filter(Boolean);
    if (chosen.length !== 1) {
      throw new UsageError("reprocess needs exactly one of --file, --folder or --all");
    }
    args.reprocessTarget =
      file !== undefined
        ? { kind: "file", path: file }
        : folder !== undefined
          ? { kind: "folder", folder }
          : { kind: "all" };

    const output = values.get("--output") ?? "overwrite";
    if (!isReprocessOutput(output)) {
      throw new UsageError(`--output must be one of ${REPROCESS_OUTPUTS.join(", ")}`);
    }
    args.reprocessOutput = output;
  } else if (command === "fetch") {
    const url = values.get("--url");
    if (!url) throw new UsageError("fetch needs --url");
    args.url = url;
    args.outputPath = values.get("--output");
  } else if (command === "process") {
    args.file = values.get("--file");
  }

  return args;
}
