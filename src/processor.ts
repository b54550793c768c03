import type { AxiosInstance } from "axios";
import type { ListingExtractor } from "./listing/extractor";
import type { Logger } from "./logger";
import type { ProcessedLedger } from "./core/store";
import type { ListingOutcome, TagSet } from "./types";
import { classifyListing } from "./listing/tags";
import { findImageUrls } from "./listing/images";
import { downloadImages } from "./listing/downloader";
import { buildTargetPath } from "./core/path";
import { getErrorMessage, getErrorStatus, sleep } from "./core/utils";

/** Everything a run shares across listings */
export interface ProcessorContext {
  http: AxiosInstance;
  extractor: ListingExtractor;
  ledger: ProcessedLedger;
  tags: TagSet;
  baseDir: string;
  delayMs: number;
  logger: Logger;
}

/**
 * Fetch one listing, file its images under a tag-derived folder and mark it
 * processed. A listing counts as processed once its page was fetched and
 * parsed, even if none of its images could be downloaded.
 */
export async function processListing(
  url: string,
  ctx: ProcessorContext
): Promise<ListingOutcome> {
  const { http, extractor, ledger, logger } = ctx;

  if (ledger.has(url)) {
    logger.info(`Skipping already processed URL: ${url}`);
    return { state: "skipped", url };
  }

  let html: string;
  try {
    const response = await http.get<string>(url, { responseType: "text" });
    html = response.data;
  } catch (err) {
    const error = getErrorMessage(err);
    logger.error(`Failed to fetch ${url}: ${error}`);
    return { state: "failed", url, status_code: getErrorStatus(err), error };
  }
  await sleep(ctx.delayMs);

  const listing = extractor.extract(html);
  logger.info(`Fetched data for ${url}: ${JSON.stringify(listing)}`);

  const tags = classifyListing(listing.description, ctx.tags);
  const folder = buildTargetPath(ctx.baseDir, listing.address, tags.features, tags.styles);

  const imageUrls = findImageUrls(html, url);
  logger.info(`Found ${imageUrls.length} image(s) for ${url}, saving to ${folder}`);
  const images = await downloadImages(imageUrls, folder, http, ctx.delayMs, logger);

  ledger.record(url);
  return { state: "recorded", url, listing, tags, folder, images };
}

/**
 * Process listings strictly one after another.
 * @param onDone - Called after each URL with its position and outcome
 */
export async function processListings(
  urls: string[],
  ctx: ProcessorContext,
  onDone?: (completed: number, total: number, outcome: ListingOutcome) => void
): Promise<ListingOutcome[]> {
  const outcomes: ListingOutcome[] = [];
  for (const url of urls) {
    const outcome = await processListing(url, ctx);
    outcomes.push(outcome);
    onDone?.(outcomes.length, urls.length, outcome);
  }
  return outcomes;
}
