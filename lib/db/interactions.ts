import { ObjectId, type Document, type Filter, type FindOptions } from "mongodb";
import type { MongoConfig } from "@/lib/config/env";
import type { InteractionRecord } from "@/lib/recs/types";
import { StoreUnavailableError, withTimeout } from "@/lib/util/errors";
import { createLogger, errorContext } from "@/lib/util/logger";
import { getDb } from "./mongo";
import { toInteractionRecord } from "./records";
import { sortNewestFirst, type InteractionStore } from "./store";

const log = createLogger({ component: "mongo-store" });

const PROJECTION = {
  user_id: 1,
  userId: 1,
  item_id: 1,
  itemId: 1,
  course_id: 1,
  timestamp: 1,
  enrolledAt: 1,
  viewedAt: 1,
};

/** The part of a Mongo collection the store reads through */
export interface ReadableCollection {
  find(filter: Filter<Document>, options: FindOptions): { toArray(): Promise<Document[]> };
}

export type CollectionSource = (name: string) => ReadableCollection;

/**
 * User ids may be stored as plain strings or as ObjectIds
 */
export function userIdVariants(userId: string): Array<string | ObjectId> {
  const variants: Array<string | ObjectId> = [userId];
  if (ObjectId.isValid(userId) && /^[0-9a-fA-F]{24}$/.test(userId)) {
    variants.push(new ObjectId(userId));
  }
  return variants;
}

export class MongoInteractionStore implements InteractionStore {
  private readonly collection: CollectionSource;

  constructor(
    private readonly config: MongoConfig,
    collection?: CollectionSource
  ) {
    this.collection = collection ?? ((name) => getDb(config).collection(name));
  }

  async fetchAllInteractions(): Promise<InteractionRecord[]> {
    return this.run("fetchAllInteractions", async () => {
      const batches = await Promise.all(
        this.config.collections.map((name) =>
          this.collection(name).find({}, { projection: PROJECTION }).toArray()
        )
      );
      return batches.flat().map((doc) => toInteractionRecord(doc));
    });
  }

  async fetchInteractionsFor(userId: string): Promise<InteractionRecord[]> {
    const variants = userIdVariants(userId);
    return this.run("fetchInteractionsFor", async () => {
      const batches = await Promise.all(
        this.config.collections.map((name) =>
          this.collection(name)
            .find(
              { $or: [{ user_id: { $in: variants } }, { userId: { $in: variants } }] },
              { projection: PROJECTION }
            )
            .toArray()
        )
      );
      return sortNewestFirst(batches.flat().map((doc) => toInteractionRecord(doc)));
    });
  }

  async close(): Promise<void> {
    // Client lifetime is owned by lib/db/mongo (closeMongo)
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        fn(),
        this.config.timeoutMs,
        () =>
          new StoreUnavailableError(
            `Interaction store did not answer within ${this.config.timeoutMs}ms`
          )
      );
    } catch (error) {
      log.error("Interaction store query failed", { operation, ...errorContext(error) });
      if (error instanceof StoreUnavailableError) throw error;
      throw new StoreUnavailableError(
        `Interaction store query failed: ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}
