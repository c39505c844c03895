import { MongoClient, type Db } from "mongodb";
import type { MongoConfig } from "@/lib/config/env";
import { logger, errorContext } from "@/lib/util/logger";

// Singleton client, one per connection URI
let client: MongoClient | null = null;
let clientUri: string | null = null;

export function getMongoClient(config: MongoConfig): MongoClient {
  if (!client || clientUri !== config.uri) {
    client = new MongoClient(config.uri, {
      // All driver waits are bounded by the store timeout
      serverSelectionTimeoutMS: config.timeoutMs,
      connectTimeoutMS: config.timeoutMs,
      socketTimeoutMS: config.timeoutMs * 2,
      maxPoolSize: 20,
    });
    clientUri = config.uri;

    client.on("serverHeartbeatFailed", (event) => {
      logger.warn("MongoDB heartbeat failed", {
        connectionId: event.connectionId,
        ...errorContext(event.failure),
      });
    });
  }
  return client;
}

export function getDb(config: MongoConfig): Db {
  return getMongoClient(config).db(config.database);
}

export async function closeMongo(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    clientUri = null;
  }
}
