/**
 * Popularity baseline: items ranked by how often they were interacted with
 */

import type { Interaction, Recommendation } from "./types";

export interface PopularItem {
  itemId: string;
  count: number;
}

export interface PopularityIndex {
  /** Ranked by count desc, then item id asc */
  readonly ranked: readonly PopularItem[];
  readonly counts: ReadonlyMap<string, number>;
}

export function compareByCountThenId(a: PopularItem, b: PopularItem): number {
  if (a.count !== b.count) return b.count - a.count;
  return a.itemId < b.itemId ? -1 : a.itemId > b.itemId ? 1 : 0;
}

export function trainPopularity(interactions: Interaction[]): PopularityIndex {
  const counts = new Map<string, number>();
  for (const { itemId } of interactions) {
    counts.set(itemId, (counts.get(itemId) ?? 0) + 1);
  }
  return popularityFromCounts(counts);
}

export function popularityFromCounts(counts: Map<string, number>): PopularityIndex {
  const ranked = [...counts]
    .map(([itemId, count]) => ({ itemId, count }))
    .sort(compareByCountThenId);

  return Object.freeze({
    ranked: Object.freeze(ranked),
    counts,
  });
}

/**
 * Top items with scores normalized by the highest count.
 * Items in `exclude` are skipped before truncation.
 */
export function recommendPopular(
  index: PopularityIndex,
  topK: number,
  exclude: ReadonlySet<string> = new Set()
): Recommendation[] {
  const top = index.ranked[0];
  if (!top || topK < 1) return [];

  const result: Recommendation[] = [];
  for (const { itemId, count } of index.ranked) {
    if (result.length >= topK) break;
    if (exclude.has(itemId)) continue;
    result.push({ itemId, score: count / top.count, source: "popular" });
  }
  return result;
}
