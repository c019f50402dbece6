// ──────────────────────────────────────────────
// Strand - Discovery-Driven Configuration
// ServiceCatalog (+ optional static base) → ServiceConfig
// ──────────────────────────────────────────────

import type {
  ActivityDescriptor,
  CatalogService,
  PipelineDefinition,
  ServiceCatalog,
} from "@strand/types";
import { ConfigurationError, createLogger } from "@strand/utils";
import type { TransformRegistry } from "../transforms/index.js";
import { DEFAULT_TIMEOUT_MS, buildRetryPolicy } from "./defaults.js";
import { inferPipelines } from "./pipeline-inference.js";
import { validatePipelines } from "./pipeline-validator.js";
import { createServiceConfig } from "./service-config.js";
import type { ServiceConfig } from "./service-config.js";

const logger = createLogger("catalog-config");

export interface CatalogLoadOptions {
  transforms: TransformRegistry;
  /** Declared descriptors and pipelines that take precedence over discovered ones. */
  base?: ServiceConfig;
}

// Active queues first so their activities win both duplicates and inference.
function orderServices(catalog: ServiceCatalog): CatalogService[] {
  return Object.values(catalog.services).sort((a, b) => {
    if (a.queueStatus !== b.queueStatus) return a.queueStatus === "active" ? -1 : 1;
    return a.serviceName.localeCompare(b.serviceName);
  });
}

export function buildServiceConfigFromCatalog(
  catalog: ServiceCatalog,
  options: CatalogLoadOptions
): ServiceConfig {
  const discovered = new Map<string, ActivityDescriptor>();

  for (const service of orderServices(catalog)) {
    for (const activity of Object.values(service.activities)) {
      const existing = discovered.get(activity.name);
      if (existing) {
        logger.debug(
          { activityName: activity.name, kept: existing.serviceName, ignored: service.serviceName },
          "Activity offered by several services"
        );
        continue;
      }

      discovered.set(activity.name, {
        name: activity.name,
        executionKind: "remote",
        taskQueue: service.taskQueue,
        serviceName: service.serviceName,
        timeoutMs: activity.timeoutSeconds > 0 ? activity.timeoutSeconds * 1000 : DEFAULT_TIMEOUT_MS,
        retryPolicy: buildRetryPolicy({ maxAttempts: activity.retryAttempts }),
        description: activity.description,
      });
    }
  }

  const activities = new Map(discovered);
  const pipelines = new Map<string, PipelineDefinition>();

  for (const descriptor of options.base?.listActivities() ?? []) {
    activities.set(descriptor.name, descriptor);
  }
  for (const pipeline of options.base?.listPipelines() ?? []) {
    pipelines.set(pipeline.name, pipeline);
  }

  for (const pipeline of inferPipelines(Array.from(discovered.keys()))) {
    if (pipelines.has(pipeline.name)) continue;
    pipelines.set(pipeline.name, pipeline);
    logger.info(
      { pipelineName: pipeline.name, steps: pipeline.steps.map((step) => step.activityName) },
      "Inferred pipeline from discovered activities"
    );
  }

  const validation = validatePipelines(pipelines.values(), activities, options.transforms);
  if (!validation.valid) {
    throw new ConfigurationError(
      `Discovered configuration is invalid: ${validation.errors.join("; ")}`,
      validation.errors
    );
  }

  logger.info(
    {
      services: Object.keys(catalog.services).length,
      activities: activities.size,
      pipelines: pipelines.size,
    },
    "Service configuration built from discovery"
  );

  return createServiceConfig({
    source: "discovery",
    activities: activities.values(),
    pipelines: pipelines.values(),
  });
}
