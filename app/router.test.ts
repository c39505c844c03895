import { describe, it, expect, beforeAll, afterAll } from "vitest";
import type { Server } from "http";
import { InMemoryInteractionStore } from "@/lib/db/memory";
import type { InteractionStore } from "@/lib/db/store";
import { ModelRegistry } from "@/lib/recs/registry";
import { RecommendationService } from "@/lib/recs/service";
import type { InteractionRecord } from "@/lib/recs/types";
import { StoreUnavailableError } from "@/lib/util/errors";
import { createApp } from "./router";

function record(userId: string, itemId: string): InteractionRecord {
  return { userId, itemId, timestamp: null };
}

const RECORDS = [
  record("u1", "A"),
  record("u1", "B"),
  record("u2", "A"),
  record("u2", "B"),
  record("u2", "C"),
  record("u3", "A"),
  record("u4", "B"),
  record("u4", "C"),
];

interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

async function startServer(store: InteractionStore, trainOnDemand = true): Promise<TestServer> {
  const registry = new ModelRegistry(store, {
    training: { minSupport: 2, minConfidence: 0.2 },
    retrainIntervalMinutes: 10,
  });
  const service = new RecommendationService(store, registry, { contextSize: 5, trainOnDemand });
  const app = createApp(service);

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === "string") throw new Error("Server has no port");

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await startServer(new InMemoryInteractionStore(RECORDS));
  });

  afterAll(async () => {
    await server.close();
  });

  it("reports health", async () => {
    const res = await fetch(`${server.baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "healthy" });
  });

  it("serves popular items", async () => {
    const res = await fetch(`${server.baseUrl}/recommendations/popular?top_k=2`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      userId: null,
      strategy: "popular",
      modelReady: true,
      recommendations: [
        { itemId: "A", score: 1, source: "popular" },
        { itemId: "B", score: 1, source: "popular" },
      ],
    });
  });

  it("serves FP-Growth recommendations for a stored user", async () => {
    const res = await fetch(`${server.baseUrl}/recommendations/fpgrowth/u3`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      userId: "u3",
      strategy: "fpgrowth",
      recommendations: [
        { itemId: "B", source: "rules" },
        { itemId: "C", source: "popular" },
      ],
    });
  });

  it("serves FP-Growth recommendations for a posted basket", async () => {
    const res = await postJson(`${server.baseUrl}/recommendations/fpgrowth`, {
      basket: ["A", "C"],
      topK: 5,
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      userId: null,
      recommendations: [{ itemId: "B", score: 1, source: "rules" }],
    });
  });

  it("serves the legacy endpoint", async () => {
    const res = await fetch(`${server.baseUrl}/recommend/newcomer?top_k=1`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      userId: "newcomer",
      strategy: "fpgrowth",
      modelReady: true,
      recommendations: [{ itemId: "A", score: 1, source: "popular" }],
    });
  });

  it("lists similar items", async () => {
    const res = await fetch(`${server.baseUrl}/recommendations/similar/C`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      itemId: "C",
      modelReady: true,
      recommendations: [{ itemId: "B", score: 1, source: "rules" }],
    });
  });

  it("retrains on request and reports the model", async () => {
    const compute = await fetch(`${server.baseUrl}/recommendations/fpgrowth/compute`, { method: "POST" });

    expect(compute.status).toBe(200);
    expect(await compute.json()).toMatchObject({ status: "success", modelInfo: { ruleCount: 4 } });

    const popular = await fetch(`${server.baseUrl}/recommendations/popular/compute`, { method: "POST" });
    expect(await popular.json()).toMatchObject({ status: "success", count: 3 });

    const model = await fetch(`${server.baseUrl}/recommendations/model`);
    expect(await model.json()).toMatchObject({ ready: true, training: false });
  });

  it("rejects an invalid top_k", async () => {
    for (const value of ["0", "-1", "abc", "2.5"]) {
      const res = await fetch(`${server.baseUrl}/recommend/u1?top_k=${value}`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "top_k must be a positive integer",
        code: "VALIDATION_ERROR",
      });
    }
  });

  it("rejects a body with neither user nor basket", async () => {
    const res = await postJson(`${server.baseUrl}/recommendations/fpgrowth`, {});

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "userId or a non-empty basket is required",
      code: "VALIDATION_ERROR",
    });
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${server.baseUrl}/recommendations/fpgrowth`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Request body is not valid JSON",
      code: "VALIDATION_ERROR",
    });
  });

  it("rejects a body over the size limit with 413", async () => {
    const res = await postJson(`${server.baseUrl}/recommendations/fpgrowth`, {
      userId: "x".repeat(200_000),
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: "request entity too large",
      code: "INVALID_REQUEST",
    });
  });

  it("rejects an unsupported body charset with 415", async () => {
    const res = await fetch(`${server.baseUrl}/recommendations/fpgrowth`, {
      method: "POST",
      headers: { "content-type": "application/json; charset=klingon" },
      body: JSON.stringify({ userId: "u1" }),
    });

    expect(res.status).toBe(415);
    expect(await res.json()).toMatchObject({ code: "INVALID_REQUEST" });
  });

  it("answers unknown paths with 404", async () => {
    const res = await fetch(`${server.baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found", code: "NOT_FOUND" });
  });
});

describe("HTTP API without data", () => {
  it("returns an empty list for an empty store", async () => {
    const server = await startServer(new InMemoryInteractionStore());
    try {
      const res = await fetch(`${server.baseUrl}/recommend/user123?top_k=10`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        userId: "user123",
        strategy: "fpgrowth",
        modelReady: true,
        recommendations: [],
      });
    } finally {
      await server.close();
    }
  });

  it("answers 503 when the store is unreachable", async () => {
    const failing: InteractionStore = {
      fetchAllInteractions: () => Promise.reject(new StoreUnavailableError("Interaction store unavailable")),
      fetchInteractionsFor: () => Promise.reject(new StoreUnavailableError("Interaction store unavailable")),
      close: async () => {},
    };
    const server = await startServer(failing);
    try {
      const res = await fetch(`${server.baseUrl}/recommend/user123`);

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({
        error: "Interaction store unavailable",
        code: "STORE_UNAVAILABLE",
      });
    } finally {
      await server.close();
    }
  });

  it("reports an untrained model when on-demand training is off", async () => {
    const server = await startServer(new InMemoryInteractionStore(RECORDS), false);
    try {
      const res = await fetch(`${server.baseUrl}/recommendations/popular`);

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ modelReady: false, recommendations: [] });
    } finally {
      await server.close();
    }
  });
});
