/**
 * FP-Growth recommendation model
 * Mines frequent itemsets from user baskets, derives association rules,
 * and ranks consequents for a basket by rule confidence.
 */

import { ValidationError } from "@/lib/util/errors";
import { mineFrequentItemsets, type FrequentItemset } from "./fptree";
import { compareRules, deriveRules, type AssociationRule } from "./rules";
import type { Recommendation } from "./types";

export interface FpGrowthOptions {
  /** Integer >= 1: absolute count. Between 0 and 1: fraction of transactions. */
  minSupport: number;
  minConfidence: number;
  maxLength?: number;
}

export interface FrequentPatternIndex {
  readonly transactionCount: number;
  readonly minSupportCount: number;
  readonly itemsets: readonly FrequentItemset[];
  readonly rules: readonly AssociationRule[];
  /** Rules keyed by the first (smallest) antecedent item */
  readonly rulesByAnchor: ReadonlyMap<string, readonly AssociationRule[]>;
}

export function resolveMinSupport(minSupport: number, transactionCount: number): number {
  if (!Number.isFinite(minSupport) || minSupport <= 0) {
    throw new ValidationError("min_support must be greater than zero");
  }
  if (minSupport >= 1) {
    if (!Number.isInteger(minSupport)) {
      throw new ValidationError("min_support above 1 must be an integer transaction count");
    }
    return minSupport;
  }
  // Tolerance keeps 0.1 * 30 at 3 rather than 4
  return Math.max(1, Math.ceil(minSupport * transactionCount - 1e-9));
}

function validateConfidence(minConfidence: number): void {
  if (!Number.isFinite(minConfidence) || minConfidence < 0 || minConfidence > 1) {
    throw new ValidationError("min_confidence must be between 0 and 1");
  }
}

export function buildPatternIndex(
  itemsets: FrequentItemset[],
  rules: AssociationRule[],
  transactionCount: number,
  minSupportCount: number
): FrequentPatternIndex {
  const sorted = [...rules].sort(compareRules);
  const rulesByAnchor = new Map<string, AssociationRule[]>();
  for (const rule of sorted) {
    const anchor = rule.antecedent[0];
    if (anchor === undefined) continue;
    const bucket = rulesByAnchor.get(anchor);
    if (bucket) bucket.push(rule);
    else rulesByAnchor.set(anchor, [rule]);
  }

  return Object.freeze({
    transactionCount,
    minSupportCount,
    itemsets: Object.freeze([...itemsets]),
    rules: Object.freeze(sorted),
    rulesByAnchor,
  });
}

export function trainFpGrowth(
  transactions: string[][],
  options: FpGrowthOptions
): FrequentPatternIndex {
  validateConfidence(options.minConfidence);
  const minSupportCount = resolveMinSupport(options.minSupport, transactions.length);

  if (transactions.length === 0) {
    return buildPatternIndex([], [], 0, minSupportCount);
  }

  const itemsets = mineFrequentItemsets(transactions, {
    minSupport: minSupportCount,
    maxLength: options.maxLength,
  });
  const rules = deriveRules(itemsets, transactions.length, options.minConfidence);

  return buildPatternIndex(itemsets, rules, transactions.length, minSupportCount);
}

/**
 * Rank consequents of rules whose antecedent lies inside the basket.
 * Each consequent keeps its strongest rule; basket items and `exclude`
 * are never returned.
 */
export function recommendForBasket(
  index: FrequentPatternIndex,
  basket: Iterable<string>,
  topK: number,
  exclude: ReadonlySet<string> = new Set()
): Recommendation[] {
  const basketSet = new Set(basket);
  const best = new Map<string, AssociationRule>();

  for (const item of basketSet) {
    for (const rule of index.rulesByAnchor.get(item) ?? []) {
      if (basketSet.has(rule.consequent) || exclude.has(rule.consequent)) continue;
      if (!rule.antecedent.every((a) => basketSet.has(a))) continue;

      const current = best.get(rule.consequent);
      if (!current || compareRules(rule, current) < 0) best.set(rule.consequent, rule);
    }
  }

  return [...best.values()]
    .sort(compareRules)
    .slice(0, Math.max(0, topK))
    .map((rule) => ({ itemId: rule.consequent, score: rule.confidence, source: "rules" as const }));
}

/**
 * Items associated with a single item (rules with antecedent exactly {itemId})
 */
export function similarItems(
  index: FrequentPatternIndex,
  itemId: string,
  topK: number
): Recommendation[] {
  return (index.rulesByAnchor.get(itemId) ?? [])
    .filter((rule) => rule.antecedent.length === 1)
    .slice(0, Math.max(0, topK))
    .map((rule) => ({ itemId: rule.consequent, score: rule.confidence, source: "rules" as const }));
}
