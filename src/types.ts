/** Options resolved from the command line, config file and defaults */
export interface RunConfig {
  urls: string[];
  baseDir: string;
  delayMs: number;
}

/** Metadata extracted from a single listing page */
export type ListingRecord = Readonly<{
  address: string;
  price: string;
  description: string;
}>;

/** Keyword lists used to classify a listing, keyed by category */
export interface TagSet {
  architectural_style_tags: string[];
  room_feature_tags: string[];
  unique_feature_tags: string[];
}

/** Tags detected in a listing description */
export interface ListingTags {
  features: string[];
  styles: string[];
}

/** Persisted tool settings. Unknown keys are kept as-is on rewrite. */
export interface AppConfig {
  base_dir?: string;
  [key: string]: unknown;
}

export interface ImageFailure {
  url: string;
  error: string;
}

/** What happened to each image of a listing */
export interface DownloadSummary {
  saved: string[];
  failed: ImageFailure[];
}

/** Result of processing one listing URL: discriminated union on `state` */
export type ListingOutcome =
  | { state: "skipped"; url: string }
  | { state: "failed"; url: string; status_code: number | null; error: string }
  | {
      state: "recorded";
      url: string;
      listing: ListingRecord;
      tags: ListingTags;
      folder: string;
      images: DownloadSummary;
    };

/** Totals printed after a run */
export interface RunSummary {
  total: number;
  recorded: number;
  skipped: number;
  failed: number;
  images_saved: number;
  images_failed: number;
  elapsed_time: string;
}
