export const envInt = (v: string | undefined, fallback: number): number => {
  if (v === undefined || v === "") return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
};

export const envString = (v: string | undefined, fallback: string): string =>
  v === undefined || v.trim() === "" ? fallback : v.trim();

export const DEFAULT_BASE_DIR = "listings";
export const DEFAULT_DELAY_SECONDS = 1.0;
export const UNKNOWN_ADDRESS = "unknown_address";

export const FILES = {
  config: envString(process.env.LISTING_CONFIG_FILE, "config.json"),
  ledger: envString(process.env.LISTING_LEDGER_FILE, "processed_urls.json"),
  tags: envString(process.env.LISTING_TAGS_FILE, "tags.json"),
  log: envString(process.env.LISTING_LOG_FILE, "scrape.log"),
};

export const REQUEST_TIMEOUT_MS = envInt(process.env.LISTING_TIMEOUT_MS, 15_000);

export const USER_AGENT = envString(
  process.env.LISTING_USER_AGENT,
  "Mozilla/5.0 (compatible; ListingBot/1.0)"
);
