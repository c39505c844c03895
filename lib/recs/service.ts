/**
 * Recommendation service
 * Maps a request to a bounded, de-duplicated list of items using the
 * current model snapshot and the user's stored history.
 */

import type { InteractionStore } from "@/lib/db/store";
import { ModelNotReadyError, ValidationError } from "@/lib/util/errors";
import { createLogger } from "@/lib/util/logger";
import { MAX_TOP_K } from "@/lib/util/params";
import { recommendForBasket, similarItems } from "./fpgrowth";
import { recommendPopular } from "./popular";
import type { ModelRegistry } from "./registry";
import type { ModelSnapshot, TrainingMetadata } from "./snapshot";
import { recentItems } from "./transactions";
import type { Recommendation, Strategy } from "./types";

const log = createLogger({ component: "recommendation-service" });

export interface RecommendationRequest {
  strategy: Strategy;
  topK: number;
  userId?: string;
  /** Explicit basket; replaces the user's recent items as rule context */
  basket?: string[];
}

export interface RecommendationResult {
  userId: string | null;
  strategy: Strategy;
  modelReady: boolean;
  recommendations: Recommendation[];
}

export interface SimilarItemsResult {
  itemId: string;
  modelReady: boolean;
  recommendations: Recommendation[];
}

export interface ModelInfo {
  ready: boolean;
  stale: boolean;
  training: boolean;
  metadata: TrainingMetadata | null;
}

export interface ServiceOptions {
  /** Most recent items of a user used as basket */
  contextSize: number;
  /** Train when a request arrives before any snapshot exists */
  trainOnDemand: boolean;
}

export function normalizeTopK(topK: number): number {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError("top_k must be a positive integer");
  }
  return Math.min(topK, MAX_TOP_K);
}

/**
 * Primary candidates first, then fallback ones, first occurrence of an
 * item wins, truncated to `topK`
 */
export function mergeCandidates(
  primary: Recommendation[],
  fallback: Recommendation[],
  topK: number
): Recommendation[] {
  const seen = new Set<string>();
  const merged: Recommendation[] = [];
  for (const rec of [...primary, ...fallback]) {
    if (merged.length >= topK) break;
    if (seen.has(rec.itemId)) continue;
    seen.add(rec.itemId);
    merged.push(rec);
  }
  return merged;
}

export class RecommendationService {
  constructor(
    private readonly store: InteractionStore,
    private readonly registry: ModelRegistry,
    private readonly options: ServiceOptions
  ) {}

  async getRecommendations(request: RecommendationRequest): Promise<RecommendationResult> {
    const topK = normalizeTopK(request.topK);
    const basket = (request.basket ?? []).map((item) => item.trim()).filter(Boolean);
    const userId = request.userId?.trim() || null;

    if (request.strategy === "fpgrowth" && !userId && basket.length === 0) {
      throw new ValidationError("user_id or basket is required");
    }

    const snapshot = await this.resolveSnapshot();
    const empty: RecommendationResult = {
      userId,
      strategy: request.strategy,
      modelReady: snapshot !== null,
      recommendations: [],
    };
    if (!snapshot) return empty;

    if (request.strategy === "popular") {
      return { ...empty, recommendations: recommendPopular(snapshot.popularity, topK) };
    }

    const history = userId ? recentItems(await this.store.fetchInteractionsFor(userId)) : [];
    const context = basket.length > 0 ? basket : history.slice(0, this.options.contextSize);
    const exclude = new Set([...history, ...context]);

    const fromRules = recommendForBasket(snapshot.patterns, context, topK, exclude);
    const fromPopular = recommendPopular(snapshot.popularity, topK + fromRules.length, exclude);
    const recommendations = mergeCandidates(fromRules, fromPopular, topK);

    log.debug("FP-Growth recommendations", {
      userId,
      contextSize: context.length,
      ruleHits: fromRules.length,
      returned: recommendations.length,
    });
    if (fromRules.length === 0) {
      log.debug("No association rule matched, serving popular items", { userId });
    }

    return { ...empty, recommendations };
  }

  async getSimilarItems(itemId: string, topK: number): Promise<SimilarItemsResult> {
    const k = normalizeTopK(topK);
    const id = itemId.trim();
    if (!id) throw new ValidationError("item_id is required");

    const snapshot = await this.resolveSnapshot();
    return {
      itemId: id,
      modelReady: snapshot !== null,
      recommendations: snapshot ? similarItems(snapshot.patterns, id, k) : [],
    };
  }

  async retrain(): Promise<TrainingMetadata> {
    const snapshot = await this.registry.retrain();
    return { ...snapshot.metadata };
  }

  modelInfo(): ModelInfo {
    const snapshot = this.registry.current();
    return {
      ready: snapshot !== null,
      stale: this.registry.isStale(),
      training: this.registry.isTraining,
      metadata: snapshot ? { ...snapshot.metadata } : null,
    };
  }

  private async resolveSnapshot(): Promise<ModelSnapshot | null> {
    if (this.options.trainOnDemand) {
      const snapshot = await this.registry.ensureReady();
      this.registry.refreshIfStale();
      return snapshot;
    }

    try {
      const snapshot = this.registry.require();
      this.registry.refreshIfStale();
      return snapshot;
    } catch (error) {
      if (!(error instanceof ModelNotReadyError)) throw error;
      log.warn("Recommendation requested before any model was trained");
      return null;
    }
  }
}
