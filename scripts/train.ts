#!/usr/bin/env tsx
/**
 * Train the recommendation model from the configured interaction store
 * and persist the snapshot for the server to restore.
 *
 * Usage:
 *   npm run model:train
 *   npm run model:train -- --min-support 0.01 --min-confidence 0.5 --max-length 3
 */

import "dotenv/config";

import { parseArgs } from "util";
import { loadConfig } from "@/lib/config/env";
import { createRuntime } from "@/lib/runtime";
import { logger, createTimer, errorContext } from "@/lib/util/logger";

const args = process.argv.slice(2).filter((arg) => arg !== "--");

const { values } = parseArgs({
  args,
  options: {
    "min-support": { type: "string" },
    "min-confidence": { type: "string" },
    "max-length": { type: "string" },
  },
});

function numberArg(value: string | undefined, fallback: number): number;
function numberArg(value: string | undefined, fallback: number | undefined): number | undefined;
function numberArg(value: string | undefined, fallback: number | undefined) {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new Error(`Not a number: ${value}`);
  return parsed;
}

async function main() {
  const base = loadConfig();
  const config = {
    ...base,
    model: {
      ...base.model,
      minSupport: numberArg(values["min-support"], base.model.minSupport),
      minConfidence: numberArg(values["min-confidence"], base.model.minConfidence),
      maxLength: numberArg(values["max-length"], base.model.maxLength),
    },
  };

  logger.info("Training recommendation model", {
    minSupport: config.model.minSupport,
    minConfidence: config.model.minConfidence,
    maxLength: config.model.maxLength,
  });

  const timer = createTimer("Train model");
  const runtime = await createRuntime(config);

  try {
    const metadata = await runtime.service.retrain();
    timer.end();
    logger.info("Model training complete", { ...metadata });
  } finally {
    await runtime.close();
  }
}

main().catch((error) => {
  logger.error("Model training failed", errorContext(error));
  process.exit(1);
});
