// ──────────────────────────────────────────────
// Strand - Discovery Service
// Control-plane queue activity × worker metadata → ServiceCatalog
// ──────────────────────────────────────────────

import type {
  CatalogService,
  DiscoveredService,
  DiscoveryStatus,
  MetadataDiscoveryResult,
  ServiceCatalog,
  ServiceCatalogProvider,
  WorkerEndpoint,
} from "@strand/types";
import { DiscoveryError, clampTimerDelay, createLogger, createTtlCache, sanitizeErrorMessage } from "@strand/utils";
import type { Clock } from "@strand/utils";
import type { ControlPlane } from "./control-plane.js";
import type { MetadataClient } from "./metadata-client.js";
import { endpointUrl } from "./metadata-client.js";
import { buildQueueCandidates } from "./queue-candidates.js";

const logger = createLogger("discovery");

export const DEFAULT_DISCOVERY_CACHE_TTL_MS = 30_000;
export const DEFAULT_CONTROL_PLANE_TIMEOUT_MS = 5_000;

/** Rejects with `${label} timed out` once `ms` pass; `work` itself is left to settle. */
function withDeadline<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${ms}ms`)), clampTimerDelay(ms));
  });
  return Promise.race([work, expired]).finally(() => clearTimeout(timer));
}

export interface DiscoveryServiceOptions {
  controlPlane: ControlPlane;
  metadataClient: MetadataClient;
  endpoints: WorkerEndpoint[];
  /** Extra service names whose conventional queue names are checked. */
  serviceNames?: string[];
  cacheTtlMs?: number;
  /** Bound on each control-plane call; an unreachable broker may never answer. */
  controlPlaneTimeoutMs?: number;
  now?: Clock;
}

export interface DiscoveryService extends ServiceCatalogProvider {
  discoverActiveTaskQueues(services?: Record<string, DiscoveredService>): Promise<string[]>;
  discoverServiceMetadata(): Promise<MetadataDiscoveryResult>;
  /** Cached for the TTL; concurrent cold callers share one pass. */
  discoverHybrid(): Promise<ServiceCatalog>;
  getStatus(): Promise<DiscoveryStatus>;
  invalidate(): void;
}

export function createDiscoveryService(options: DiscoveryServiceOptions): DiscoveryService {
  const { controlPlane, metadataClient, endpoints } = options;
  const now = options.now ?? Date.now;
  const cache = createTtlCache<ServiceCatalog>({
    ttlMs: options.cacheTtlMs ?? DEFAULT_DISCOVERY_CACHE_TTL_MS,
    now,
  });
  const controlPlaneTimeoutMs = options.controlPlaneTimeoutMs ?? DEFAULT_CONTROL_PLANE_TIMEOUT_MS;
  let inFlight: Promise<ServiceCatalog> | null = null;
  let generation = 0;
  let lastUnreachable: string[] = [];

  const checkControlPlane = (): Promise<void> =>
    withDeadline(controlPlane.checkConnection(), controlPlaneTimeoutMs, "Control plane check");

  const ensureControlPlane = async (): Promise<void> => {
    try {
      await checkControlPlane();
    } catch (err) {
      throw new DiscoveryError(`Control plane unreachable: ${sanitizeErrorMessage(err)}`, { cause: err });
    }
  };

  const discoverServiceMetadata = async (): Promise<MetadataDiscoveryResult> => {
    const settled = await Promise.allSettled(
      endpoints.map((endpoint) => metadataClient.fetchMetadata(endpoint))
    );

    const services: Record<string, DiscoveredService> = {};
    const unreachable: string[] = [];

    settled.forEach((outcome, index) => {
      const endpoint = endpoints[index];
      const url = endpoint ? endpointUrl(endpoint) : `endpoint#${index}`;

      if (outcome.status === "rejected") {
        unreachable.push(url);
        logger.warn({ endpoint: url, error: sanitizeErrorMessage(outcome.reason) }, "Worker metadata unavailable");
        return;
      }

      const service = outcome.value;
      const existing = services[service.serviceName];
      if (existing) {
        logger.warn(
          { serviceName: service.serviceName, kept: existing.endpoint, ignored: url },
          "Service reported by several endpoints"
        );
        return;
      }
      services[service.serviceName] = service;
    });

    lastUnreachable = unreachable;
    logger.info(
      { discovered: Object.keys(services).length, unreachable: unreachable.length },
      "Worker metadata discovery finished"
    );
    return { services, unreachable };
  };

  const discoverActiveTaskQueues = async (
    services?: Record<string, DiscoveredService>
  ): Promise<string[]> => {
    await ensureControlPlane();

    const known = services ?? (await discoverServiceMetadata()).services;
    const candidates = buildQueueCandidates(
      Object.values(known).map((service) => service.taskQueue),
      [...Object.keys(known), ...(options.serviceNames ?? [])]
    );

    const results = await Promise.all(
      candidates.map(async (candidate) => {
        try {
          const description = await withDeadline(
            controlPlane.describeTaskQueue(candidate),
            controlPlaneTimeoutMs,
            `Describe ${candidate}`
          );
          return description.pollers.length > 0 ? candidate : null;
        } catch (err) {
          logger.warn({ taskQueue: candidate, error: sanitizeErrorMessage(err) }, "Task queue describe failed");
          return null;
        }
      })
    );

    const active = results.filter((queue): queue is string => queue !== null).sort();
    logger.debug({ candidates: candidates.length, active }, "Active task queues discovered");
    return active;
  };

  const runHybrid = async (): Promise<ServiceCatalog> => {
    const startedIn = generation;
    const metadata = await discoverServiceMetadata();
    const activeTaskQueues = await discoverActiveTaskQueues(metadata.services);
    const active = new Set(activeTaskQueues);

    const services: Record<string, CatalogService> = {};
    for (const service of Object.values(metadata.services)) {
      services[service.serviceName] = {
        ...service,
        queueStatus: active.has(service.taskQueue) ? "active" : "inactive",
      };
    }

    const catalog: ServiceCatalog = {
      services,
      activeTaskQueues,
      discoveredAt: new Date(now()).toISOString(),
    };
    if (startedIn === generation) {
      cache.set(catalog);
    }

    logger.info(
      {
        services: Object.keys(services).length,
        inactive: Object.values(services)
          .filter((service) => service.queueStatus === "inactive")
          .map((service) => service.serviceName),
      },
      "Service catalog refreshed"
    );
    return catalog;
  };

  const discoverHybrid = (): Promise<ServiceCatalog> => {
    const cached = cache.get();
    if (cached) return Promise.resolve(cached);

    if (inFlight) return inFlight;

    const pass = runHybrid().finally(() => {
      if (inFlight === pass) inFlight = null;
    });
    inFlight = pass;
    return pass;
  };

  return {
    discoverActiveTaskQueues,
    discoverServiceMetadata,
    discoverHybrid,

    async getStatus() {
      const controlPlaneConnected = await checkControlPlane().then(
        () => true,
        (err: unknown) => {
          logger.warn({ error: sanitizeErrorMessage(err) }, "Control plane check failed");
          return false;
        }
      );

      const services = controlPlaneConnected
        ? (await discoverHybrid()).services
        : (await discoverServiceMetadata()).services;

      const list = Object.values(services);
      return {
        servicesCount: list.length,
        activitiesCount: list.reduce((total, service) => total + Object.keys(service.activities).length, 0),
        controlPlaneConnected,
        metadataEndpointsReachable: endpoints.length - lastUnreachable.length,
      };
    },

    invalidate() {
      generation++;
      inFlight = null;
      cache.clear();
    },
  };
}
