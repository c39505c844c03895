/**
 * Wiring shared by the HTTP server and the CLI scripts
 */

import type { AppConfig } from "@/lib/config/env";
import { MongoInteractionStore } from "@/lib/db/interactions";
import { closeMongo } from "@/lib/db/mongo";
import type { InteractionStore } from "@/lib/db/store";
import { createSnapshotStore, type SnapshotStore } from "@/lib/features/cache";
import { loadCsvStore } from "@/lib/ingest/csv";
import { ModelRegistry } from "@/lib/recs/registry";
import { RecommendationService } from "@/lib/recs/service";
import { logger } from "@/lib/util/logger";

export interface Runtime {
  store: InteractionStore;
  persistence: SnapshotStore;
  registry: ModelRegistry;
  service: RecommendationService;
  close(): Promise<void>;
}

export async function createStore(config: AppConfig): Promise<InteractionStore> {
  if (config.csvPath) {
    logger.info("Using CSV interaction store", { path: config.csvPath });
    return loadCsvStore(config.csvPath);
  }
  logger.info("Using MongoDB interaction store", {
    database: config.mongo.database,
    collections: config.mongo.collections,
  });
  return new MongoInteractionStore(config.mongo);
}

export async function createRuntime(
  config: AppConfig,
  overrides: { store?: InteractionStore; persistence?: SnapshotStore } = {}
): Promise<Runtime> {
  const store = overrides.store ?? (await createStore(config));
  const persistence = overrides.persistence ?? createSnapshotStore(config.persistence);

  const registry = new ModelRegistry(store, {
    training: {
      minSupport: config.model.minSupport,
      minConfidence: config.model.minConfidence,
      maxLength: config.model.maxLength,
    },
    retrainIntervalMinutes: config.model.retrainIntervalMinutes,
    persistence,
  });

  const service = new RecommendationService(store, registry, {
    contextSize: config.model.contextSize,
    trainOnDemand: config.model.trainOnDemand,
  });

  return {
    store,
    persistence,
    registry,
    service,
    async close() {
      await store.close();
      await persistence.close();
      await closeMongo();
    },
  };
}
