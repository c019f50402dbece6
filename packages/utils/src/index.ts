// ──────────────────────────────────────────────
// Strand - Utils Package
// ──────────────────────────────────────────────

export {
  rootLogger,
  createLogger,
  createCorrelationId,
  createPipelineLogger,
  toActivityLogger,
} from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadConfig,
  getEnvOrThrow,
  getEnvOrDefault,
  getEnvAsNumber,
  getEnvAsList,
  getEnvAsTimerMs,
  parseEndpoint,
} from "./config.js";
export type { AppConfig, PipelineConfigSource, VectorStoreKind } from "./config.js";
export {
  generateId,
  sleep,
  truncateString,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  isNonEmptyString,
  isRecord,
  clampTimerDelay,
  MAX_TIMER_DELAY_MS,
} from "./helpers.js";
export {
  PipelineError,
  ConfigurationError,
  TransformError,
  ActivityExecutionError,
  PipelineTimeoutError,
  DiscoveryError,
  ActivityTimeoutError,
  NonRetryableActivityError,
} from "./errors.js";
export type { ConfigurationErrorCode } from "./errors.js";
export { createTtlCache } from "./cache.js";
export type { TtlCache, TtlCacheOptions, Clock } from "./cache.js";
