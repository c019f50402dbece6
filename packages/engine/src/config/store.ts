// ──────────────────────────────────────────────
// Strand - Service Configuration Store
// Loads a complete config, then swaps the reference
// ──────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import type { ServiceCatalogProvider } from "@strand/types";
import { ConfigurationError, createLogger, sanitizeErrorMessage } from "@strand/utils";
import type { TransformRegistry } from "../transforms/index.js";
import { buildServiceConfigFromCatalog } from "./catalog-loader.js";
import { parseServiceConfigDocument } from "./static-loader.js";
import type { ServiceConfig } from "./service-config.js";

const logger = createLogger("service-config-store");

export type ServiceConfigSource =
  | { kind: "file"; path: string }
  | { kind: "document"; text: string }
  | { kind: "discovery"; provider: ServiceCatalogProvider; base?: ServiceConfig };

export interface ServiceConfigLoadOptions {
  transforms: TransformRegistry;
}

async function readConfigFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read service config file ${path}: ${sanitizeErrorMessage(err)}`);
  }
}

export async function loadServiceConfig(
  source: ServiceConfigSource,
  options: ServiceConfigLoadOptions
): Promise<ServiceConfig> {
  switch (source.kind) {
    case "file": {
      const text = await readConfigFile(source.path);
      return parseServiceConfigDocument(text, { transforms: options.transforms, source: "file" });
    }
    case "document":
      return parseServiceConfigDocument(source.text, { transforms: options.transforms, source: "document" });
    case "discovery": {
      const catalog = await source.provider.discoverHybrid();
      return buildServiceConfigFromCatalog(catalog, { transforms: options.transforms, base: source.base });
    }
  }
}

export interface ServiceConfigStore {
  current(): ServiceConfig;
  /** Returns the config that was replaced. */
  replace(next: ServiceConfig): ServiceConfig;
  /** A failed load leaves the current config in place. */
  reload(source: ServiceConfigSource): Promise<ServiceConfig>;
}

export function createServiceConfigStore(
  initial: ServiceConfig,
  options: ServiceConfigLoadOptions
): ServiceConfigStore {
  let config = initial;

  const replace = (next: ServiceConfig): ServiceConfig => {
    const previous = config;
    config = next;
    logger.info(
      {
        source: next.source,
        activities: next.listActivities().length,
        pipelines: next.listPipelines().length,
      },
      "Service configuration swapped"
    );
    return previous;
  };

  return {
    current: () => config,
    replace,
    async reload(source) {
      const next = await loadServiceConfig(source, options);
      replace(next);
      return next;
    },
  };
}
