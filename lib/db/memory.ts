import type { InteractionRecord } from "@/lib/recs/types";
import { sortNewestFirst, type InteractionStore } from "./store";

/**
 * Process-local store, used for CSV-backed runs and tests
 */
export class InMemoryInteractionStore implements InteractionStore {
  private readonly records: InteractionRecord[];

  constructor(records: InteractionRecord[] = []) {
    this.records = [...records];
  }

  async fetchAllInteractions(): Promise<InteractionRecord[]> {
    return [...this.records];
  }

  async fetchInteractionsFor(userId: string): Promise<InteractionRecord[]> {
    return sortNewestFirst(this.records.filter((r) => r.userId === userId));
  }

  add(...records: InteractionRecord[]): void {
    this.records.push(...records);
  }

  async close(): Promise<void> {}
}
