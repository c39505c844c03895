/**
 * Holds the current model snapshot.
 * Requests read the reference without locking; training builds a fresh
 * snapshot off to the side and swaps the reference when it is complete.
 */

import type { InteractionStore } from "@/lib/db/store";
import type { SnapshotStore } from "@/lib/features/cache";
import { ModelNotReadyError } from "@/lib/util/errors";
import { createLogger, createTimer, errorContext } from "@/lib/util/logger";
import type { FpGrowthOptions } from "./fpgrowth";
import { trainSnapshot, type ModelSnapshot } from "./snapshot";

const log = createLogger({ component: "model-registry" });

export interface RegistryOptions {
  training: FpGrowthOptions;
  retrainIntervalMinutes: number;
  persistence?: SnapshotStore;
  now?: () => Date;
}

export class ModelRegistry {
  private snapshot: ModelSnapshot | null = null;
  private inflight: Promise<ModelSnapshot> | null = null;

  constructor(
    private readonly store: InteractionStore,
    private readonly options: RegistryOptions
  ) {}

  current(): ModelSnapshot | null {
    return this.snapshot;
  }

  require(): ModelSnapshot {
    if (!this.snapshot) throw new ModelNotReadyError();
    return this.snapshot;
  }

  get isTraining(): boolean {
    return this.inflight !== null;
  }

  isStale(): boolean {
    if (!this.snapshot) return true;
    const age = this.now().getTime() - Date.parse(this.snapshot.metadata.trainedAt);
    return age > this.options.retrainIntervalMinutes * 60_000;
  }

  /**
   * Train from the store and swap in the result.
   * Concurrent callers share one training run.
   */
  retrain(): Promise<ModelSnapshot> {
    if (!this.inflight) {
      this.inflight = this.train().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  async ensureReady(): Promise<ModelSnapshot> {
    return this.snapshot ?? this.retrain();
  }

  /**
   * Kick off a background retrain when the snapshot is old.
   * The caller keeps serving the current snapshot meanwhile.
   */
  refreshIfStale(): void {
    if (!this.snapshot || this.inflight || !this.isStale()) return;

    log.info("Model snapshot is stale, retraining in background", {
      trainedAt: this.snapshot.metadata.trainedAt,
    });
    this.retrain().catch((error: unknown) => {
      log.error("Background retrain failed", errorContext(error));
    });
  }

  /**
   * Load the last persisted snapshot, if any
   */
  async restore(): Promise<boolean> {
    const restored = await this.options.persistence?.load();
    if (!restored) return false;
    // A training run that finished first wins
    if (!this.snapshot) this.snapshot = restored;
    log.info("Restored persisted model snapshot", { ...restored.metadata });
    return true;
  }

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  private async train(): Promise<ModelSnapshot> {
    const timer = createTimer("Model training", log);
    log.info("Starting model training");

    const records = await this.store.fetchAllInteractions();
    const snapshot = trainSnapshot(records, this.options.training, () => this.now());
    this.snapshot = snapshot;

    const { metadata } = snapshot;
    if (metadata.skippedRecords > 0) {
      log.warn("Skipped malformed interaction records", {
        skipped: metadata.skippedRecords,
        total: metadata.recordCount,
      });
    }
    timer.end({ ...metadata });
    log.info("Model training complete", {
      transactions: metadata.transactionCount,
      itemsets: metadata.itemsetCount,
      rules: metadata.ruleCount,
    });

    if (this.options.persistence) {
      try {
        await this.options.persistence.save(snapshot);
      } catch (error) {
        log.warn("Failed to persist model snapshot", errorContext(error));
      }
    }

    return snapshot;
  }
}
