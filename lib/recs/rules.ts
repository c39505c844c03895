import { itemsetKey, type FrequentItemset } from "./fptree";

export interface AssociationRule {
  /** Sorted ascending */
  antecedent: string[];
  consequent: string;
  /** Transactions containing antecedent and consequent */
  support: number;
  confidence: number;
  lift: number;
}

/**
 * Derive single-consequent rules `S \ {c} -> c` from every frequent itemset S
 * of size two or more. Subsets of a frequent itemset are frequent, so every
 * antecedent support is present in `itemsets`.
 */
export function deriveRules(
  itemsets: FrequentItemset[],
  transactionCount: number,
  minConfidence: number
): AssociationRule[] {
  const supportByKey = new Map<string, number>();
  for (const set of itemsets) supportByKey.set(itemsetKey(set.items), set.support);

  const rules: AssociationRule[] = [];
  for (const set of itemsets) {
    if (set.items.length < 2) continue;

    for (const consequent of set.items) {
      const antecedent = set.items.filter((item) => item !== consequent);
      const antecedentSupport = supportByKey.get(itemsetKey(antecedent));
      const consequentSupport = supportByKey.get(itemsetKey([consequent]));
      if (!antecedentSupport || !consequentSupport) continue;

      const confidence = set.support / antecedentSupport;
      if (confidence < minConfidence) continue;

      rules.push({
        antecedent,
        consequent,
        support: set.support,
        confidence,
        lift: confidence / (consequentSupport / transactionCount),
      });
    }
  }

  return rules.sort(compareRules);
}

/**
 * Confidence desc, support desc, lift desc, consequent asc
 */
export function compareRules(a: AssociationRule, b: AssociationRule): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  if (a.support !== b.support) return b.support - a.support;
  if (a.lift !== b.lift) return b.lift - a.lift;
  if (a.consequent !== b.consequent) return a.consequent < b.consequent ? -1 : 1;
  const ka = itemsetKey(a.antecedent);
  const kb = itemsetKey(b.antecedent);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}
