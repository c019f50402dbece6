export {
  DEFAULT_TIMEOUT_MS,
  DEFAULT_INITIAL_INTERVAL_MS,
  DEFAULT_MAX_INTERVAL_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_POLICY,
  buildRetryPolicy,
} from "./defaults.js";
export { createServiceConfig } from "./service-config.js";
export type { ServiceConfig, ServiceConfigTables } from "./service-config.js";
export { validatePipelines } from "./pipeline-validator.js";
export type { PipelineValidationResult } from "./pipeline-validator.js";
export { parseServiceConfigDocument, LOCAL_ACTIVITIES_KEY, LOCAL_SERVICE_NAME } from "./static-loader.js";
export type { StaticLoadOptions } from "./static-loader.js";
export {
  inferPipelines,
  DOCUMENT_PROCESSING_PIPELINE,
  DOCUMENT_RETRIEVAL_PIPELINE,
  HEALTH_CHECK_PIPELINE,
} from "./pipeline-inference.js";
export { buildServiceConfigFromCatalog } from "./catalog-loader.js";
export type { CatalogLoadOptions } from "./catalog-loader.js";
export { loadServiceConfig, createServiceConfigStore } from "./store.js";
export type { ServiceConfigSource, ServiceConfigLoadOptions, ServiceConfigStore } from "./store.js";
