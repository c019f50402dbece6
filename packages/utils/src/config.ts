// ──────────────────────────────────────────────
// Strand - Environment Configuration Helper
// ──────────────────────────────────────────────

import { MAX_TIMER_DELAY_MS } from "./helpers.js";

export function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

/** Milliseconds that must fit in a timer; 0 means unset. */
export function getEnvAsTimerMs(key: string, defaultValue: number): number {
  const value = getEnvAsNumber(key, defaultValue);
  if (value < 0 || value > MAX_TIMER_DELAY_MS) {
    throw new Error(`Environment variable ${key} must be between 0 and ${MAX_TIMER_DELAY_MS}, got: ${value}`);
  }
  return value;
}

export function getEnvAsList(key: string, defaultValue: string[] = []): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function parseEndpoint(value: string): { host: string; port: number } {
  const separator = value.lastIndexOf(":");
  const host = separator > 0 ? value.slice(0, separator) : "";
  const port = separator > 0 ? parseInt(value.slice(separator + 1), 10) : NaN;
  if (!host || isNaN(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid endpoint "${value}", expected host:port`);
  }
  return { host, port };
}

function getEnumOrDefault<T extends string>(key: string, allowed: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  if (!value) return defaultValue;
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw new Error(`Environment variable ${key} must be one of ${allowed.join(", ")}, got: ${value}`);
  }
  return match;
}

export type PipelineConfigSource = "static" | "discovery";
export type VectorStoreKind = "memory" | "postgres";

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;

  redis: {
    host: string;
    port: number;
  };

  databaseUrl: string | null;

  backend: {
    port: number;
    host: string;
  };

  pipeline: {
    configPath: string;
    source: PipelineConfigSource;
    defaultCollection: string;
    timeoutMs: number | null;
  };

  discovery: {
    endpoints: Array<{ host: string; port: number }>;
    serviceNames: string[];
    cacheTtlMs: number;
    metadataTimeoutMs: number;
    controlPlaneTimeoutMs: number;
  };

  worker: {
    serviceName: string;
    taskQueue: string;
    activities: string[];
    concurrency: number;
    metadataHost: string;
    metadataPort: number;
    version: string;
    vectorStore: VectorStoreKind;
  };

  rateLimit: {
    max: number;
    windowMs: number;
  };
}

export function loadConfig(): AppConfig {
  const pipelineTimeoutMs = getEnvAsTimerMs("PIPELINE_TIMEOUT_MS", 0);

  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),

    redis: {
      host: getEnvOrThrow("REDIS_HOST"),
      port: getEnvAsNumber("REDIS_PORT", 6379),
    },

    databaseUrl: process.env["DATABASE_URL"] ?? null,

    backend: {
      port: getEnvAsNumber("BACKEND_PORT", 4000),
      host: getEnvOrDefault("BACKEND_HOST", "0.0.0.0"),
    },

    pipeline: {
      configPath: getEnvOrDefault("PIPELINE_CONFIG_PATH", "config/services.yaml"),
      source: getEnumOrDefault("PIPELINE_CONFIG_SOURCE", ["static", "discovery"] as const, "static"),
      defaultCollection: getEnvOrDefault("DOCUMENT_COLLECTION_NAME", "document_chunks"),
      timeoutMs: pipelineTimeoutMs > 0 ? pipelineTimeoutMs : null,
    },

    discovery: {
      endpoints: getEnvAsList("DISCOVERY_ENDPOINTS").map(parseEndpoint),
      serviceNames: getEnvAsList("DISCOVERY_SERVICE_NAMES"),
      cacheTtlMs: getEnvAsNumber("DISCOVERY_CACHE_TTL_MS", 30_000),
      metadataTimeoutMs: getEnvAsTimerMs("DISCOVERY_METADATA_TIMEOUT_MS", 10_000),
      controlPlaneTimeoutMs: getEnvAsTimerMs("DISCOVERY_CONTROL_PLANE_TIMEOUT_MS", 5_000),
    },

    worker: {
      serviceName: getEnvOrDefault("WORKER_SERVICE_NAME", "embedding_service"),
      taskQueue: getEnvOrDefault("WORKER_TASK_QUEUE", "embedding-task-queue"),
      activities: getEnvAsList("WORKER_ACTIVITIES", ["embed_and_index_activity", "chunk_documents_activity"]),
      concurrency: getEnvAsNumber("WORKER_CONCURRENCY", 5),
      metadataHost: getEnvOrDefault("METADATA_HOST", "0.0.0.0"),
      metadataPort: getEnvAsNumber("METADATA_PORT", 8082),
      version: getEnvOrDefault("SERVICE_VERSION", "1.0.0"),
      vectorStore: getEnumOrDefault("VECTOR_STORE", ["memory", "postgres"] as const, "memory"),
    },

    rateLimit: {
      max: getEnvAsNumber("RATE_LIMIT_MAX", 100),
      windowMs: getEnvAsNumber("RATE_LIMIT_WINDOW_MS", 60000),
    },
  };
}
