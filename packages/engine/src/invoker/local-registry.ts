// ──────────────────────────────────────────────
// Strand - Local Activity Registry
// In-process activities keyed by name
// ──────────────────────────────────────────────

import type { ActivityDefinition, ActivityFunction } from "@strand/types";

export interface LocalActivityRegistry {
  get(name: string): ActivityFunction | undefined;
  has(name: string): boolean;
  names(): string[];
}

export function createLocalActivityRegistry(
  activities: readonly Pick<ActivityDefinition, "name" | "run">[]
): LocalActivityRegistry {
  const registry = new Map<string, ActivityFunction>();

  for (const activity of activities) {
    if (registry.has(activity.name)) {
      throw new Error(`Activity "${activity.name}" is already registered`);
    }
    registry.set(activity.name, activity.run);
  }

  return Object.freeze({
    get: (name: string) => registry.get(name),
    has: (name: string) => registry.has(name),
    names: () => Array.from(registry.keys()),
  });
}
