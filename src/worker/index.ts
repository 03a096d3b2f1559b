import "dotenv/config";
import { USAGE, UsageError, parseArgs, type CliArgs } from "./cli";
import { locationFormats } from "./adapters";
import { createPolicyFetcher } from "./http/pageFetcher";
import { createNotifier, notificationConfigFromEnv } from "./notify/mailtrap";
import { runCommand } from "./pipeline/run";
import { Transformer } from "./pipeline/transform";
import { loadEnv } from "@/lib/config";

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(`[worker] ${err.message}\n\n${USAGE}`);
    return 1;
  }

  const env = loadEnv();
  const { exitCode } = await runCommand({
    args,
    resultsDir: args.resultsDir ?? env.RESULTS_DIR,
    configPath: args.configPath ?? env.URL_CONFIGS_PATH,
    fetcher: createPolicyFetcher({
      timeoutMs: env.FETCH_TIMEOUT_MS,
      maxRetries: env.FETCH_MAX_RETRIES,
    }),
    transformer: new Transformer({ bgnPerEur: env.BGN_PER_EUR, locationFormats: locationFormats() }),
    notifier: createNotifier(notificationConfigFromEnv(env)),
  });
  return exitCode;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error("Worker failed:", err);
    process.exit(1);
  });
