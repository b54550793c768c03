import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { DEFAULT_BASE_DIR } from "../config";
import type { AppConfig, TagSet } from "../types";

/** Thrown when a persisted file exists but cannot be used */
export class StoreError extends Error {
  constructor(
    message: string,
    readonly filePath: string
  ) {
    super(message);
    this.name = "StoreError";
  }
}

export interface Store<T> {
  load(): T;
  save(value: T): void;
}

/**
 * A value persisted as one JSON document.
 * A missing file loads as the fallback; a file that is not valid JSON or
 * does not match the schema raises a StoreError instead of being replaced.
 */
export class JsonFileStore<T> implements Store<T> {
  constructor(
    readonly filePath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly label: string,
    private readonly fallback: () => T
  ) {}

  load(): T {
    if (!fs.existsSync(this.filePath)) return this.fallback();

    const raw = fs.readFileSync(this.filePath, "utf-8");
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new StoreError(
        `Corrupt ${this.label} file "${this.filePath}": ${msg}`,
        this.filePath
      );
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      throw new StoreError(
        `Invalid ${this.label} file "${this.filePath}": ${result.error.issues
          .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
          .join("; ")}`,
        this.filePath
      );
    }
    return result.data;
  }

  save(value: T): void {
    fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(value, null, 2) + "\n", "utf-8");
  }
}

const configSchema: z.ZodType<AppConfig, z.ZodTypeDef, unknown> = z
  .object({ base_dir: z.string().min(1).optional() })
  .passthrough();

const tagListSchema = z.array(z.string()).default([]);

const tagSetSchema: z.ZodType<TagSet, z.ZodTypeDef, unknown> = z.object({
  architectural_style_tags: tagListSchema,
  room_feature_tags: tagListSchema,
  unique_feature_tags: tagListSchema,
});

const ledgerSchema = z.array(z.string());

export const emptyTagSet = (): TagSet => ({
  architectural_style_tags: [],
  room_feature_tags: [],
  unique_feature_tags: [],
});

/** A config without `base_dir` loads with the default filled in */
export function createConfigStore(filePath: string): Store<AppConfig> {
  const store = new JsonFileStore<AppConfig>(filePath, configSchema, "config", () => ({}));
  return {
    load: () => {
      const cfg = store.load();
      return { ...cfg, base_dir: cfg.base_dir ?? DEFAULT_BASE_DIR };
    },
    save: (value) => store.save(value),
  };
}

export function createTagStore(filePath: string): Store<TagSet> {
  return new JsonFileStore<TagSet>(filePath, tagSetSchema, "tags", emptyTagSet);
}

export function createLedgerStore(filePath: string): Store<string[]> {
  return new JsonFileStore<string[]>(filePath, ledgerSchema, "ledger", () => []);
}

/**
 * URLs already processed. Loaded once, then every `record` appends and
 * rewrites the backing store straight away.
 */
export class ProcessedLedger {
  private readonly order: string[];
  private readonly seen: Set<string>;

  constructor(private readonly store: Store<string[]>) {
    this.order = [];
    this.seen = new Set();
    for (const url of store.load()) {
      if (this.seen.has(url)) continue;
      this.seen.add(url);
      this.order.push(url);
    }
  }

  has(url: string): boolean {
    return this.seen.has(url);
  }

  record(url: string): void {
    if (this.seen.has(url)) return;
    this.seen.add(url);
    this.order.push(url);
    this.store.save([...this.order]);
  }

  get urls(): readonly string[] {
    return this.order;
  }
}
