// ──────────────────────────────────────────────
// Strand - Service Discovery Types
// ──────────────────────────────────────────────

import type { ActivityParameter, ActivityReturns } from "./activity.js";

export type QueueStatus = "active" | "inactive";
export type WorkerHealth = "healthy" | "degraded";

export interface ActivityMetadata {
  name: string;
  description: string;
  timeoutSeconds: number;
  retryAttempts: number;
  parameters: ActivityParameter[];
  returns: ActivityReturns | null;
}

export interface DiscoveredService {
  serviceName: string;
  taskQueue: string;
  workerIdentity: string | null;
  health: WorkerHealth;
  version: string | null;
  endpoint: string;
  activities: Record<string, ActivityMetadata>;
}

export interface CatalogService extends DiscoveredService {
  queueStatus: QueueStatus;
}

export interface ServiceCatalog {
  services: Record<string, CatalogService>;
  activeTaskQueues: string[];
  discoveredAt: string;
}

export interface MetadataDiscoveryResult {
  services: Record<string, DiscoveredService>;
  unreachable: string[];
}

export interface ServiceCatalogProvider {
  discoverHybrid(): Promise<ServiceCatalog>;
}

export interface WorkerEndpoint {
  host: string;
  port: number;
}

export interface TaskQueuePoller {
  identity: string;
  address: string | null;
}

export interface TaskQueueDescription {
  name: string;
  pollers: TaskQueuePoller[];
}

export interface DiscoveryStatus {
  servicesCount: number;
  activitiesCount: number;
  controlPlaneConnected: boolean;
  metadataEndpointsReachable: number;
}

/** Wire shape served on GET /metadata by every activity worker. */
export interface WorkerMetadataDocument {
  service_name: string;
  task_queue: string;
  worker_identity: string;
  health: WorkerHealth;
  version: string;
  activities: Array<{
    name: string;
    description: string;
    timeout_seconds: number;
    retry_attempts: number;
    parameters: ActivityParameter[];
    returns: ActivityReturns;
  }>;
}
