/**
 * FP-tree construction and FP-Growth mining.
 *
 * Transactions are compressed into a prefix tree whose paths follow the
 * global item order (descending support, ties by item id). Frequent
 * itemsets are then grown from conditional pattern bases, one suffix item
 * at a time, without generating candidate sets.
 */

export interface FrequentItemset {
  /** Sorted ascending */
  items: string[];
  support: number;
}

/** A path of items with the number of transactions that share it */
interface WeightedPath {
  items: string[];
  count: number;
}

class FpNode {
  count = 0;
  readonly children = new Map<string, FpNode>();
  /** Next node carrying the same item */
  link: FpNode | null = null;

  constructor(
    readonly item: string | null,
    readonly parent: FpNode | null
  ) {}
}

interface HeaderEntry {
  support: number;
  head: FpNode | null;
  tail: FpNode | null;
}

export class FpTree {
  private readonly root = new FpNode(null, null);
  private readonly headers = new Map<string, HeaderEntry>();
  /** Frequent items, most frequent first */
  readonly order: readonly string[];

  private constructor(order: string[], supports: Map<string, number>) {
    this.order = order;
    for (const item of order) {
      this.headers.set(item, { support: supports.get(item) ?? 0, head: null, tail: null });
    }
  }

  static build(paths: WeightedPath[], minSupport: number): FpTree {
    const supports = new Map<string, number>();
    for (const path of paths) {
      for (const item of new Set(path.items)) {
        supports.set(item, (supports.get(item) ?? 0) + path.count);
      }
    }

    const order = [...supports]
      .filter(([, support]) => support >= minSupport)
      .sort(([a, sa], [b, sb]) => (sa !== sb ? sb - sa : a < b ? -1 : a > b ? 1 : 0))
      .map(([item]) => item);

    const tree = new FpTree(order, supports);
    const rank = new Map(order.map((item, i) => [item, i]));

    for (const path of paths) {
      const ordered = [...new Set(path.items)]
        .filter((item) => rank.has(item))
        .sort((a, b) => (rank.get(a) ?? 0) - (rank.get(b) ?? 0));
      if (ordered.length > 0) tree.insert(ordered, path.count);
    }

    return tree;
  }

  get isEmpty(): boolean {
    return this.order.length === 0;
  }

  support(item: string): number {
    return this.headers.get(item)?.support ?? 0;
  }

  private insert(items: string[], count: number): void {
    let node = this.root;
    for (const item of items) {
      let child = node.children.get(item);
      if (!child) {
        child = new FpNode(item, node);
        node.children.set(item, child);
        this.link(item, child);
      }
      child.count += count;
      node = child;
    }
  }

  private link(item: string, node: FpNode): void {
    const entry = this.headers.get(item);
    if (!entry) return;
    if (entry.tail) entry.tail.link = node;
    else entry.head = node;
    entry.tail = node;
  }

  /**
   * Prefix paths ending just above each occurrence of `item`
   */
  conditionalPatternBase(item: string): WeightedPath[] {
    const base: WeightedPath[] = [];
    for (let node = this.headers.get(item)?.head ?? null; node; node = node.link) {
      const prefix: string[] = [];
      for (let p = node.parent; p && p.item !== null; p = p.parent) {
        prefix.push(p.item);
      }
      if (prefix.length > 0) base.push({ items: prefix, count: node.count });
    }
    return base;
  }
}

export interface MineOptions {
  /** Absolute transaction count */
  minSupport: number;
  /** Largest itemset size to emit */
  maxLength?: number;
}

/**
 * Mine every itemset whose support reaches `minSupport`
 */
export function mineFrequentItemsets(
  transactions: string[][],
  options: MineOptions
): FrequentItemset[] {
  const paths = transactions.map((items) => ({ items, count: 1 }));
  const tree = FpTree.build(paths, options.minSupport);
  const out: FrequentItemset[] = [];
  grow(tree, [], options, out);
  return out.sort(compareItemsets);
}

function grow(tree: FpTree, suffix: string[], options: MineOptions, out: FrequentItemset[]): void {
  // Least frequent first
  for (let i = tree.order.length - 1; i >= 0; i--) {
    const item = tree.order[i];
    const itemset = [item, ...suffix];
    out.push({ items: [...itemset].sort(), support: tree.support(item) });

    if (options.maxLength !== undefined && itemset.length >= options.maxLength) continue;

    const conditional = FpTree.build(tree.conditionalPatternBase(item), options.minSupport);
    if (!conditional.isEmpty) grow(conditional, itemset, options, out);
  }
}

/**
 * Smaller itemsets first, then support desc, then lexicographic
 */
export function compareItemsets(a: FrequentItemset, b: FrequentItemset): number {
  if (a.items.length !== b.items.length) return a.items.length - b.items.length;
  if (a.support !== b.support) return b.support - a.support;
  const ka = itemsetKey(a.items);
  const kb = itemsetKey(b.items);
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Stable key for a set of items, independent of input order
 */
export function itemsetKey(items: readonly string[]): string {
  return JSON.stringify([...items].sort());
}
