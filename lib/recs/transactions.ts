import type { Interaction, InteractionRecord } from "./types";

export interface NormalizedInteractions {
  interactions: Interaction[];
  /** Records dropped for a missing user or item id */
  skipped: number;
}

/**
 * Drop malformed records, keeping a count of what was dropped
 */
export function normalizeInteractions(records: InteractionRecord[]): NormalizedInteractions {
  const interactions: Interaction[] = [];
  let skipped = 0;

  for (const record of records) {
    if (!record.userId || !record.itemId) {
      skipped++;
      continue;
    }
    interactions.push({
      userId: record.userId,
      itemId: record.itemId,
      timestamp: record.timestamp,
    });
  }

  return { interactions, skipped };
}

/**
 * One transaction per user: the distinct items that user touched,
 * in first-seen order. Users with fewer than `minSize` items are left out.
 */
export function buildTransactions(interactions: Interaction[], minSize = 1): string[][] {
  const byUser = new Map<string, Set<string>>();

  for (const { userId, itemId } of interactions) {
    let basket = byUser.get(userId);
    if (!basket) {
      basket = new Set();
      byUser.set(userId, basket);
    }
    basket.add(itemId);
  }

  const transactions: string[][] = [];
  for (const basket of byUser.values()) {
    if (basket.size >= minSize) transactions.push([...basket]);
  }
  return transactions;
}

/**
 * Distinct item ids of a user's records, most recent first
 */
export function recentItems(records: InteractionRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    if (record.itemId) seen.add(record.itemId);
  }
  return [...seen];
}
