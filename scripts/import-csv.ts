#!/usr/bin/env tsx
/**
 * Import a CSV of interactions (user_id,item_id[,timestamp]) into MongoDB
 *
 * Usage:
 *   npm run data:import-csv -- --file ./data/interactions.csv
 *   npm run data:import-csv -- --file ./data/interactions.csv --collection interactions --drop
 */

import "dotenv/config";

import { parseArgs } from "util";
import { loadConfig } from "@/lib/config/env";
import { closeMongo, getDb } from "@/lib/db/mongo";
import { readInteractionsCsv } from "@/lib/ingest/csv";
import { normalizeInteractions } from "@/lib/recs/transactions";
import { parsePositiveInt } from "@/lib/util/params";
import { logger, createTimer, errorContext } from "@/lib/util/logger";

const args = process.argv.slice(2).filter((arg) => arg !== "--");

const { values } = parseArgs({
  args,
  options: {
    file: { type: "string" },
    collection: { type: "string" },
    drop: { type: "boolean", default: false },
    "batch-size": { type: "string", default: "1000" },
  },
});

async function main() {
  const file = values.file;
  if (!file) throw new Error("--file is required");

  const config = loadConfig();
  const collectionName = values.collection ?? config.mongo.collections[0] ?? "interactions";
  const batchSize = parsePositiveInt(values["batch-size"], "--batch-size", 1000);

  const timer = createTimer("CSV import");
  const records = await readInteractionsCsv(file);
  const { interactions, skipped } = normalizeInteractions(records);
  if (skipped > 0) {
    logger.warn("Skipping rows without user_id or item_id", { skipped });
  }

  const collection = getDb(config.mongo).collection(collectionName);
  if (values.drop) {
    logger.info("Clearing collection", { collection: collectionName });
    await collection.deleteMany({});
  }

  let inserted = 0;
  for (let i = 0; i < interactions.length; i += batchSize) {
    const docs = interactions.slice(i, i + batchSize).map((interaction) => ({
      user_id: interaction.userId,
      item_id: interaction.itemId,
      timestamp: interaction.timestamp,
    }));
    const result = await collection.insertMany(docs, { ordered: false });
    inserted += result.insertedCount;
    logger.debug("Inserted batch", { inserted, total: interactions.length });
  }

  timer.end({ inserted, skipped });
  logger.info("CSV import complete", { collection: collectionName, inserted, skipped });

  await closeMongo();
}

main().catch((error) => {
  logger.error("CSV import failed", errorContext(error));
  process.exit(1);
});
