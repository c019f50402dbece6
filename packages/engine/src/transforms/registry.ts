// ──────────────────────────────────────────────
// Strand - Transform Registry
// Built once at startup and frozen
// ──────────────────────────────────────────────

import { ConfigurationError, createLogger } from "@strand/utils";
import type { TransformDefinition, TransformFn } from "./types.js";
import { passthroughTransform } from "./passthrough.js";
import { queryWithCollectionTransform } from "./query-with-collection.js";
import { documentsTransform } from "./documents.js";
import { chunkedDocsWithCollectionTransform } from "./chunked-docs-with-collection.js";

const logger = createLogger("transform-registry");

export const BUILTIN_TRANSFORMS: readonly TransformDefinition[] = [
  queryWithCollectionTransform,
  documentsTransform,
  chunkedDocsWithCollectionTransform,
  passthroughTransform,
];

export interface TransformRegistry {
  /** Unknown names fall back to passthrough. */
  get(name: string): TransformFn;
  /** Strict lookup used when a configuration is loaded. */
  resolve(name: string): TransformFn;
  has(name: string): boolean;
  names(): string[];
}

export function createTransformRegistry(
  definitions: readonly TransformDefinition[] = BUILTIN_TRANSFORMS
): TransformRegistry {
  const registry = new Map<string, TransformDefinition>();

  for (const definition of definitions) {
    if (registry.has(definition.name)) {
      throw new Error(`Transform "${definition.name}" is already registered`);
    }
    registry.set(definition.name, definition);
  }

  const names = (): string[] => Array.from(registry.keys());

  return Object.freeze({
    get(name: string): TransformFn {
      const definition = registry.get(name);
      if (definition) return definition.apply;

      logger.warn({ transformName: name, available: names() }, "Unknown transform, using passthrough");
      return passthroughTransform.apply;
    },

    resolve(name: string): TransformFn {
      const definition = registry.get(name);
      if (!definition) {
        throw new ConfigurationError(
          `Unknown transform "${name}". Available transforms: ${names().join(", ")}`
        );
      }
      return definition.apply;
    },

    has: (name: string) => registry.has(name),
    names,
  });
}
