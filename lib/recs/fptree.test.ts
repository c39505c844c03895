import { describe, it, expect } from "vitest";
import { FpTree, compareItemsets, itemsetKey, mineFrequentItemsets } from "./fptree";

const BASKETS = [["A", "B"], ["A", "B", "C"], ["A"], ["B", "C"]];

describe("mineFrequentItemsets", () => {
  it("finds every itemset at or above the support threshold", () => {
    const itemsets = mineFrequentItemsets(BASKETS, { minSupport: 2 });

    expect(itemsets).toEqual([
      { items: ["A"], support: 3 },
      { items: ["B"], support: 3 },
      { items: ["C"], support: 2 },
      { items: ["A", "B"], support: 2 },
      { items: ["B", "C"], support: 2 },
    ]);
  });

  it("finds the three-item set when the threshold allows it", () => {
    const itemsets = mineFrequentItemsets(BASKETS, { minSupport: 1 });
    const keys = itemsets.map((set) => itemsetKey(set.items));

    expect(keys).toContain(itemsetKey(["A", "B", "C"]));
    expect(keys).toContain(itemsetKey(["A", "C"]));
    expect(itemsets.find((set) => set.items.length === 3)?.support).toBe(1);
    expect(itemsets).toHaveLength(7);
  });

  it("never reports a subset with lower support than its superset", () => {
    const baskets = [
      ["milk", "bread", "eggs"],
      ["milk", "bread"],
      ["bread", "eggs", "jam"],
      ["milk", "eggs", "jam"],
      ["milk", "bread", "eggs", "jam"],
      ["bread", "jam"],
    ];
    const itemsets = mineFrequentItemsets(baskets, { minSupport: 2 });
    const support = new Map(itemsets.map((set) => [itemsetKey(set.items), set.support]));

    for (const set of itemsets) {
      for (const item of set.items) {
        if (set.items.length < 2) continue;
        const subset = set.items.filter((i) => i !== item);
        expect(support.get(itemsetKey(subset))).toBeGreaterThanOrEqual(set.support);
      }
    }
  });

  it("counts an item repeated inside one basket once", () => {
    const itemsets = mineFrequentItemsets([["A", "A", "B"], ["A", "B"]], { minSupport: 2 });

    expect(itemsets).toEqual([
      { items: ["A"], support: 2 },
      { items: ["B"], support: 2 },
      { items: ["A", "B"], support: 2 },
    ]);
  });

  it("stops growing itemsets at maxLength", () => {
    const itemsets = mineFrequentItemsets(BASKETS, { minSupport: 2, maxLength: 1 });

    expect(itemsets.map((set) => set.items)).toEqual([["A"], ["B"], ["C"]]);
  });

  it("returns nothing when no item is frequent", () => {
    expect(mineFrequentItemsets(BASKETS, { minSupport: 5 })).toEqual([]);
    expect(mineFrequentItemsets([], { minSupport: 1 })).toEqual([]);
  });
});

describe("FpTree", () => {
  it("orders frequent items by support, ties by id", () => {
    const tree = FpTree.build(
      BASKETS.map((items) => ({ items, count: 1 })),
      2
    );

    expect(tree.order).toEqual(["A", "B", "C"]);
    expect(tree.support("C")).toBe(2);
    expect(tree.support("Z")).toBe(0);
  });

  it("collects the prefix paths above an item", () => {
    const tree = FpTree.build(
      BASKETS.map((items) => ({ items, count: 1 })),
      2
    );
    const base = tree.conditionalPatternBase("C");

    expect(base).toHaveLength(2);
    expect(base).toContainEqual({ items: ["B", "A"], count: 1 });
    expect(base).toContainEqual({ items: ["B"], count: 1 });
  });
});

describe("compareItemsets", () => {
  it("puts smaller sets first, then higher support", () => {
    const sorted = [
      { items: ["A", "B"], support: 5 },
      { items: ["B"], support: 2 },
      { items: ["A"], support: 4 },
    ].sort(compareItemsets);

    expect(sorted.map((set) => set.items)).toEqual([["A"], ["B"], ["A", "B"]]);
  });
});
