import { trainFpGrowth, type FpGrowthOptions, type FrequentPatternIndex } from "./fpgrowth";
import { trainPopularity, type PopularityIndex } from "./popular";
import { buildTransactions, normalizeInteractions } from "./transactions";
import type { InteractionRecord } from "./types";

export interface TrainingMetadata {
  trainedAt: string;
  durationMs: number;
  recordCount: number;
  /** Records without a user or item id */
  skippedRecords: number;
  transactionCount: number;
  itemCount: number;
  minSupport: number;
  minSupportCount: number;
  minConfidence: number;
  maxLength?: number;
  itemsetCount: number;
  ruleCount: number;
}

/**
 * Everything a request needs, trained from one read of the store.
 * Never mutated after construction; retraining builds a new one.
 */
export interface ModelSnapshot {
  readonly popularity: PopularityIndex;
  readonly patterns: FrequentPatternIndex;
  readonly metadata: Readonly<TrainingMetadata>;
}

export function trainSnapshot(
  records: InteractionRecord[],
  options: FpGrowthOptions,
  now: () => Date = () => new Date()
): ModelSnapshot {
  const started = performance.now();
  const { interactions, skipped } = normalizeInteractions(records);

  const popularity = trainPopularity(interactions);
  const transactions = buildTransactions(interactions);
  const patterns = trainFpGrowth(transactions, options);

  const metadata: TrainingMetadata = {
    trainedAt: now().toISOString(),
    durationMs: Math.round(performance.now() - started),
    recordCount: records.length,
    skippedRecords: skipped,
    transactionCount: transactions.length,
    itemCount: popularity.ranked.length,
    minSupport: options.minSupport,
    minSupportCount: patterns.minSupportCount,
    minConfidence: options.minConfidence,
    maxLength: options.maxLength,
    itemsetCount: patterns.itemsets.length,
    ruleCount: patterns.rules.length,
  };

  return Object.freeze({ popularity, patterns, metadata: Object.freeze(metadata) });
}
