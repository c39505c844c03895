import type { InteractionRecord } from "@/lib/recs/types";

/**
 * Read side of the interaction data.
 * Implementations reject with StoreUnavailableError when the backing
 * database cannot be reached.
 */
export interface InteractionStore {
  fetchAllInteractions(): Promise<InteractionRecord[]>;
  /** Records of one user, newest first */
  fetchInteractionsFor(userId: string): Promise<InteractionRecord[]>;
  close(): Promise<void>;
}

/**
 * Newest first; records without a timestamp sort last
 */
export function sortNewestFirst(records: InteractionRecord[]): InteractionRecord[] {
  return [...records].sort((a, b) => {
    const ta = a.timestamp?.getTime() ?? Number.NEGATIVE_INFINITY;
    const tb = b.timestamp?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (ta === tb) return 0;
    return tb > ta ? 1 : -1;
  });
}
