import { z } from "zod";
import { config } from "dotenv";

// Load .env for the server and CLI scripts
config();

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  // Interaction store
  MONGO_HOST: z.string().min(1).default("localhost"),
  MONGO_PORT: z.coerce.number().int().positive().default(27017),
  MONGO_URI: z.string().min(1).optional(),
  MONGO_DB: z.string().min(1).default("recsys"),
  MONGO_COLLECTIONS: z.string().min(1).default("interactions"),
  INTERACTIONS_CSV: z.string().min(1).optional(),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  // HTTP
  PORT: z.coerce.number().int().positive().default(8080),

  // Model
  FP_MIN_SUPPORT: z.coerce
    .number()
    .positive()
    .refine((value) => value < 1 || Number.isInteger(value), {
      message: "FP_MIN_SUPPORT above 1 must be an integer transaction count",
    })
    .default(2),
  FP_MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.2),
  FP_MAX_LENGTH: z.coerce.number().int().min(1).optional(),
  FP_CONTEXT_SIZE: z.coerce.number().int().positive().default(5),
  RETRAIN_INTERVAL_MINUTES: z.coerce.number().positive().default(10),
  TRAIN_ON_DEMAND: booleanFlag.default("true"),

  // Snapshot persistence
  REDIS_URL: z.string().url().optional(),
  MODEL_DIR: z.string().default("./data/models"),

  // App settings
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

export interface MongoConfig {
  uri: string;
  database: string;
  collections: string[];
  timeoutMs: number;
}

export interface ModelConfig {
  minSupport: number;
  minConfidence: number;
  maxLength?: number;
  contextSize: number;
  retrainIntervalMinutes: number;
  trainOnDemand: boolean;
}

export interface AppConfig {
  port: number;
  nodeEnv: Env["NODE_ENV"];
  mongo: MongoConfig;
  csvPath?: string;
  model: ModelConfig;
  persistence: {
    redisUrl?: string;
    modelDir: string;
  };
}

let cachedEnv: Env | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error("Invalid environment variables:");
    console.error(parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) return cachedEnv;
  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

/**
 * MONGO_URI wins over MONGO_HOST/MONGO_PORT
 */
export function resolveMongoUri(env: Pick<Env, "MONGO_URI" | "MONGO_HOST" | "MONGO_PORT">): string {
  return env.MONGO_URI ?? `mongodb://${env.MONGO_HOST}:${env.MONGO_PORT}`;
}

/**
 * Map validated env into the structure handed to each component at startup
 */
export function toAppConfig(env: Env): AppConfig {
  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    mongo: {
      uri: resolveMongoUri(env),
      database: env.MONGO_DB,
      collections: env.MONGO_COLLECTIONS.split(",")
        .map((name) => name.trim())
        .filter(Boolean),
      timeoutMs: env.STORE_TIMEOUT_MS,
    },
    csvPath: env.INTERACTIONS_CSV,
    model: {
      minSupport: env.FP_MIN_SUPPORT,
      minConfidence: env.FP_MIN_CONFIDENCE,
      maxLength: env.FP_MAX_LENGTH,
      contextSize: env.FP_CONTEXT_SIZE,
      retrainIntervalMinutes: env.RETRAIN_INTERVAL_MINUTES,
      trainOnDemand: env.TRAIN_ON_DEMAND,
    },
    persistence: {
      redisUrl: env.REDIS_URL,
      modelDir: env.MODEL_DIR,
    },
  };
}

export function loadConfig(): AppConfig {
  return toAppConfig(getEnv());
}

/**
 * Check if we're in development
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}
