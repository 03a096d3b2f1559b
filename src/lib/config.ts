/**
 * Runtime configuration: environment variables and the per-site search
 * configuration file (url_configs.json). Both are validated with zod.
 */
import * as fs from "fs";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import { BGN_PER_EUR } from "./domain/normalize";

// ==================== ENVIRONMENT ====================

const EnvSchema = z.object({
  MAILTRAP_TOKEN: z.string().min(1).optional(),
  MAILTRAP_SENDER_EMAIL: z.string().email().optional(),
  MAILTRAP_SEND_TO_EMAIL: z.string().email().optional(),
  BGN_PER_EUR: z.coerce.number().positive().default(BGN_PER_EUR),
  RESULTS_DIR: z.string().min(1).default("results"),
  URL_CONFIGS_PATH: z.string().min(1).default("url_configs.json"),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  FETCH_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
});

export type AppEnv = z.infer<typeof EnvSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate the environment. Empty variables count as unset, so a copied
 * .env.example with blank values still loads.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): AppEnv {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

// ==================== SEARCH CONFIGURATION ====================

export const SearchUrlSchema = z.object({
  url: z.string().url(),
  /** Human-readable search name; also the source of the output folder */
  name: z.string().min(1).optional(),
  /** Explicit output folder, overriding the slug of `name` */
  folder: z.string().min(1).optional(),
});

export const SiteSearchConfigSchema = z.object({
  urls: z.array(SearchUrlSchema).optional(),
  /** homes.bg neighbourhood ids to search apartments in */
  neighborhoodIds: z.array(z.number().int().positive()).optional(),
  /** homes.bg: also search agricultural land */
  includeLand: z.boolean().optional(),
});

export type SearchUrl = z.infer<typeof SearchUrlSchema>;
export type SiteSearchConfig = z.infer<typeof SiteSearchConfigSchema>;

/** The raw url_configs.json document: site name -> unvalidated entry. */
export type UrlConfigFile = Record<string, unknown>;

const UrlConfigFileSchema = z.record(z.unknown());

/** Read url_configs.json. A missing or unparsable file is a ConfigError. */
export function loadUrlConfigFile(filePath: string): UrlConfigFile {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Malformed JSON in ${filePath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const parsed = UrlConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`${filePath} must be an object keyed by site name`);
  }
  return parsed.data;
}

/**
 * Validate one site's entry. Missing or malformed entries raise ConfigError,
 * which disables only that site.
 */
export function getSiteSearchConfig(file: UrlConfigFile, site: string): SiteSearchConfig {
  const entry = file[site];
  if (entry === undefined) {
    throw new ConfigError(`No entry for ${site} in url configs`, { site });
  }
  const parsed = SiteSearchConfigSchema.safeParse(entry);
  if (!parsed.success) {
    throw new ConfigError(`Malformed config for ${site}: ${formatIssues(parsed.error)}`, {
      site,
    });
  }
  return parsed.data;
}
