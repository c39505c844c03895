/**
 * Shared recommendation types
 */

/** Interaction as read from a store, before validation */
export interface InteractionRecord {
  userId: string | null;
  itemId: string | null;
  timestamp: Date | null;
}

export interface Interaction {
  userId: string;
  itemId: string;
  timestamp: Date | null;
}

export type RecommendationSource = "rules" | "popular";

export interface Recommendation {
  itemId: string;
  score: number;
  source: RecommendationSource;
}

export type Strategy = "popular" | "fpgrowth";
