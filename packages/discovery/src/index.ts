// ──────────────────────────────────────────────
// Strand - Discovery Package
// ──────────────────────────────────────────────

export {
  createDiscoveryService,
  DEFAULT_CONTROL_PLANE_TIMEOUT_MS,
  DEFAULT_DISCOVERY_CACHE_TTL_MS,
} from "./discovery-service.js";
export type { DiscoveryService, DiscoveryServiceOptions } from "./discovery-service.js";
export type { ControlPlane } from "./control-plane.js";
export { createBullMQControlPlane, CONTROL_QUEUE } from "./bullmq-control-plane.js";
export type { BullMQControlPlaneOptions, QueueHandle, QueueOpener } from "./bullmq-control-plane.js";
export {
  createMetadataClient,
  endpointUrl,
  workerMetadataSchema,
  METADATA_PATH,
} from "./metadata-client.js";
export type { FetchFn, MetadataClient, MetadataClientOptions } from "./metadata-client.js";
export { buildQueueCandidates, queueNameVariants } from "./queue-candidates.js";
