#!/usr/bin/env tsx
/**
 * HTTP entry point
 *
 * Usage:
 *   npm start
 */

// Load .env BEFORE other imports that may use process.env
import "dotenv/config";

import { createApp } from "@/app/router";
import { loadConfig } from "@/lib/config/env";
import { createRuntime } from "@/lib/runtime";
import { logger, errorContext } from "@/lib/util/logger";

async function main() {
  const config = loadConfig();
  const runtime = await createRuntime(config);
  const { registry } = runtime;

  const restored = await registry.restore();
  if (!restored) {
    registry.retrain().catch((error: unknown) => {
      logger.error("Initial model training failed", errorContext(error));
    });
  }

  // Scheduled retraining; requests never wait on it
  const schedule = setInterval(() => {
    if (registry.current()) {
      registry.refreshIfStale();
      return;
    }
    registry.retrain().catch((error: unknown) => {
      logger.error("Scheduled model training failed", errorContext(error));
    });
  }, config.model.retrainIntervalMinutes * 60_000);
  schedule.unref();

  const app = createApp(runtime.service);
  const server = app.listen(config.port, () => {
    logger.info(`Recommendation service listening on http://localhost:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    clearInterval(schedule);
    server.close(() => {
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Error during shutdown", errorContext(error));
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
  logger.error("Server failed to start", errorContext(error));
  process.exit(1);
});
