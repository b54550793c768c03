import * as path from "path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { AxiosAdapter } from "axios";
import { DEFAULT_BASE_DIR, DEFAULT_DELAY_SECONDS, FILES, REQUEST_TIMEOUT_MS } from "./config";
import { FileLogger } from "./logger";
import type { Logger } from "./logger";
import {
  ProcessedLedger,
  createConfigStore,
  createLedgerStore,
  createTagStore,
} from "./core/store";
import { createHttpClient, formatDuration, getErrorMessage } from "./core/utils";
import { CheerioListingExtractor } from "./listing/extractor";
import { processListings } from "./processor";
import type { ListingOutcome, RunConfig, RunSummary } from "./types";

export interface CliOptions {
  urls: string[];
  baseDir?: string;
  delay: number;
}

/** Where a run reads and writes its files, and how it reaches the network */
export interface RunEnvironment {
  files: typeof FILES;
  timeout: number;
  adapter?: AxiosAdapter;
}

function parseDelay(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError("Delay must be a non-negative number of seconds.");
  }
  return seconds;
}

/**
 * Parse CLI arguments (without the node and script entries).
 * Throws CommanderError on invalid input or after printing --help.
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const program = new Command()
    .name("listing-downloader")
    .description("Download listing images into folders named after the address and detected tags")
    .argument("[urls...]", "Listing URLs")
    .option("--base-dir <path>", "Base directory to save listings (persisted)")
    .option("--delay <seconds>", "Delay between requests in seconds", parseDelay, DEFAULT_DELAY_SECONDS)
    .exitOverride()
    .parse(argv, { from: "user" });

  const opts = program.opts<Omit<CliOptions, "urls">>();
  return { ...opts, urls: program.args };
}

export function summarize(outcomes: ListingOutcome[], elapsedMs: number): RunSummary {
  const summary: RunSummary = {
    total: outcomes.length,
    recorded: 0,
    skipped: 0,
    failed: 0,
    images_saved: 0,
    images_failed: 0,
    elapsed_time: formatDuration(elapsedMs),
  };
  for (const o of outcomes) {
    if (o.state === "recorded") {
      summary.recorded++;
      summary.images_saved += o.images.saved.length;
      summary.images_failed += o.images.failed.length;
    } else if (o.state === "skipped") {
      summary.skipped++;
    } else {
      summary.failed++;
    }
  }
  return summary;
}

function reportProgress(completed: number, total: number, outcome: ListingOutcome): void {
  const prefix = `   [${completed}/${total}]`;
  switch (outcome.state) {
    case "recorded":
      console.log(
        `${prefix}  + ${outcome.url} (${outcome.images.saved.length} image(s) → ${outcome.folder})`
      );
      break;
    case "skipped":
      console.log(`${prefix}  = ${outcome.url} (already processed)`);
      break;
    case "failed":
      console.log(`${prefix}  x ${outcome.url}: ${outcome.error}`);
      break;
  }
}

export function defaultEnvironment(): RunEnvironment {
  return { files: FILES, timeout: REQUEST_TIMEOUT_MS };
}

/**
 * Run the tool. Resolves to the process exit code: 0 once every URL has been
 * attempted, 1 on usage errors and on failures that stop the run.
 */
export async function run(
  argv: string[],
  env: RunEnvironment = defaultEnvironment()
): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const logger: Logger = new FileLogger(env.files.log);

  try {
    const configStore = createConfigStore(env.files.config);
    const cfg = configStore.load();
    const baseDir = opts.baseDir ?? cfg.base_dir ?? DEFAULT_BASE_DIR;
    configStore.save({ ...cfg, base_dir: baseDir });

    const tags = createTagStore(env.files.tags).load();
    const ledger = new ProcessedLedger(createLedgerStore(env.files.ledger));
    const http = createHttpClient(env.timeout, env.adapter);

    const urls = opts.urls;
    if (urls.length === 0) {
      console.error("Error: No listing URLs provided.");
      logger.error("No listing URLs provided");
      return 1;
    }

    const config: RunConfig = {
      urls,
      baseDir,
      delayMs: Math.round(opts.delay * 1000),
    };
    logger.info(
      `Starting run: ${config.urls.length} URL(s), base dir ${path.resolve(config.baseDir)}, delay ${config.delayMs}ms`
    );
    console.log(`Processing ${config.urls.length} listing(s) into ${config.baseDir}/\n`);

    const startTime = Date.now();
    const outcomes = await processListings(
      config.urls,
      {
        http,
        extractor: new CheerioListingExtractor(),
        ledger,
        tags,
        baseDir: config.baseDir,
        delayMs: config.delayMs,
        logger,
      },
      reportProgress
    );
    const summary = summarize(outcomes, Date.now() - startTime);
    logger.info(`Run finished: ${JSON.stringify(summary)}`);

    console.log(`\nDone in ${summary.elapsed_time}`);
    console.log(`   Recorded: ${summary.recorded}/${summary.total}`);
    console.log(`   Skipped:  ${summary.skipped}/${summary.total}`);
    console.log(`   Failed:   ${summary.failed}/${summary.total}`);
    console.log(`   Images:   ${summary.images_saved} saved, ${summary.images_failed} failed`);
    return 0;
  } catch (err: unknown) {
    logger.exception(`Run aborted: ${getErrorMessage(err)}`, err);
    console.error(`\n   Error: ${getErrorMessage(err)}`);
    return 1;
  }
}
