// ──────────────────────────────────────────────
// Strand - Pipeline Validator
// Checks every step resolves before a config is accepted
// ──────────────────────────────────────────────

import type { ActivityDescriptor, PipelineDefinition } from "@strand/types";
import type { TransformRegistry } from "../transforms/index.js";

export interface PipelineValidationResult {
  valid: boolean;
  errors: string[];
}

export function validatePipelines(
  pipelines: Iterable<PipelineDefinition>,
  activities: ReadonlyMap<string, ActivityDescriptor>,
  transforms: Pick<TransformRegistry, "has" | "names">
): PipelineValidationResult {
  const errors: string[] = [];

  for (const pipeline of pipelines) {
    if (pipeline.steps.length === 0) {
      errors.push(`Pipeline "${pipeline.name}" has no steps`);
      continue;
    }

    pipeline.steps.forEach((step, index) => {
      const where = `Pipeline "${pipeline.name}" step ${index}`;
      const descriptor = activities.get(step.activityName);

      if (!descriptor) {
        errors.push(`${where} references unknown activity "${step.activityName}"`);
      } else {
        if (step.declaredKind && step.declaredKind !== descriptor.executionKind) {
          errors.push(
            `${where} declares "${step.activityName}" as ${step.declaredKind} but it is configured as ${descriptor.executionKind}`
          );
        }
        if (step.serviceName && step.serviceName !== descriptor.serviceName) {
          errors.push(
            `${where} expects "${step.activityName}" on service "${step.serviceName}" but it belongs to "${descriptor.serviceName}"`
          );
        }
      }

      if (!transforms.has(step.transformName)) {
        errors.push(
          `${where} references unknown transform "${step.transformName}". Available transforms: ${transforms.names().join(", ")}`
        );
      }
    });
  }

  return { valid: errors.length === 0, errors };
}
