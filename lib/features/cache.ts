/**
 * Persistence for trained model snapshots
 * Redis when configured, JSON file otherwise. A restarted process restores
 * the last snapshot before it serves.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { Redis } from "ioredis";
import { z } from "zod";
import { buildPatternIndex } from "@/lib/recs/fpgrowth";
import { popularityFromCounts } from "@/lib/recs/popular";
import type { ModelSnapshot } from "@/lib/recs/snapshot";
import { createLogger, errorContext } from "@/lib/util/logger";

const log = createLogger({ component: "snapshot-cache" });

const FORMAT_VERSION = 1;
const SNAPSHOT_FILE = "fp_growth_snapshot.json";
const REDIS_KEY = "recs:snapshot";

const itemsetSchema = z.object({
  items: z.array(z.string()),
  support: z.number().int().positive(),
});

const ruleSchema = z.object({
  antecedent: z.array(z.string()).min(1),
  consequent: z.string(),
  support: z.number().int().positive(),
  confidence: z.number().min(0).max(1),
  lift: z.number().nonnegative(),
});

const snapshotSchema = z.object({
  version: z.literal(FORMAT_VERSION),
  popularity: z.array(z.tuple([z.string(), z.number().int().positive()])),
  patterns: z.object({
    transactionCount: z.number().int().nonnegative(),
    minSupportCount: z.number().int().positive(),
    itemsets: z.array(itemsetSchema),
    rules: z.array(ruleSchema),
  }),
  metadata: z.object({
    trainedAt: z.string().datetime(),
    durationMs: z.number().nonnegative(),
    recordCount: z.number().int().nonnegative(),
    skippedRecords: z.number().int().nonnegative(),
    transactionCount: z.number().int().nonnegative(),
    itemCount: z.number().int().nonnegative(),
    minSupport: z.number().positive(),
    minSupportCount: z.number().int().positive(),
    minConfidence: z.number().min(0).max(1),
    maxLength: z.number().int().positive().optional(),
    itemsetCount: z.number().int().nonnegative(),
    ruleCount: z.number().int().nonnegative(),
  }),
});

export function serializeSnapshot(snapshot: ModelSnapshot): string {
  const payload: z.input<typeof snapshotSchema> = {
    version: FORMAT_VERSION,
    popularity: snapshot.popularity.ranked.map(({ itemId, count }): [string, number] => [itemId, count]),
    patterns: {
      transactionCount: snapshot.patterns.transactionCount,
      minSupportCount: snapshot.patterns.minSupportCount,
      itemsets: [...snapshot.patterns.itemsets],
      rules: [...snapshot.patterns.rules],
    },
    metadata: { ...snapshot.metadata },
  };
  return JSON.stringify(payload);
}

/**
 * Rebuild a snapshot, including its lookup indexes, from serialized form
 */
export function deserializeSnapshot(raw: string): ModelSnapshot {
  const data = snapshotSchema.parse(JSON.parse(raw));
  const { patterns } = data;

  return Object.freeze({
    popularity: popularityFromCounts(new Map(data.popularity)),
    patterns: buildPatternIndex(
      patterns.itemsets,
      patterns.rules,
      patterns.transactionCount,
      patterns.minSupportCount
    ),
    metadata: Object.freeze(data.metadata),
  });
}

export interface SnapshotStore {
  load(): Promise<ModelSnapshot | null>;
  save(snapshot: ModelSnapshot): Promise<void>;
  close(): Promise<void>;
}

export class FileSnapshotStore implements SnapshotStore {
  readonly path: string;

  constructor(modelDir: string) {
    this.path = join(modelDir, SNAPSHOT_FILE);
  }

  async load(): Promise<ModelSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (error) {
      log.info("No persisted snapshot on disk", { path: this.path, ...errorContext(error) });
      return null;
    }

    try {
      return deserializeSnapshot(raw);
    } catch (error) {
      log.warn("Persisted snapshot is unreadable, ignoring it", {
        path: this.path,
        ...errorContext(error),
      });
      return null;
    }
  }

  async save(snapshot: ModelSnapshot): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    // Write then rename so readers never see a partial file
    const tmp = `${this.path}.${process.pid}.tmp`;
    await writeFile(tmp, serializeSnapshot(snapshot), "utf-8");
    await rename(tmp, this.path);
  }

  async close(): Promise<void> {}
}

export class RedisSnapshotStore implements SnapshotStore {
  private readonly redis: Redis;

  constructor(url: string, private readonly key = REDIS_KEY) {
    this.redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 2 });
    this.redis.on("error", (err) => {
      log.warn("Redis error", { error: String(err) });
    });
  }

  async load(): Promise<ModelSnapshot | null> {
    try {
      const value = await this.redis.get(this.key);
      return value ? deserializeSnapshot(value) : null;
    } catch (error) {
      log.warn("Redis snapshot load failed", { key: this.key, ...errorContext(error) });
      return null;
    }
  }

  async save(snapshot: ModelSnapshot): Promise<void> {
    await this.redis.set(this.key, serializeSnapshot(snapshot));
  }

  async close(): Promise<void> {
    this.redis.disconnect();
  }
}

export function createSnapshotStore(options: { redisUrl?: string; modelDir: string }): SnapshotStore {
  if (options.redisUrl) {
    log.info("Persisting model snapshots in Redis");
    return new RedisSnapshotStore(options.redisUrl);
  }
  return new FileSnapshotStore(options.modelDir);
}
