// ──────────────────────────────────────────────
// Strand - Task Queue Candidates
// Plausible queue names derived from service names
// ──────────────────────────────────────────────

const SERVICE_SUFFIX = "_service";
const KEBAB_SERVICE_SUFFIX = "-service";

export function queueNameVariants(serviceName: string): string[] {
  const kebab = serviceName.replace(/_/g, "-");
  const variants = [`${serviceName}-task-queue`, `${kebab}-task-queue`, `${serviceName}-queue`];

  if (serviceName.endsWith(SERVICE_SUFFIX)) {
    variants.push(`${serviceName.slice(0, -SERVICE_SUFFIX.length)}-task-queue`);
  }
  if (kebab.endsWith(KEBAB_SERVICE_SUFFIX)) {
    variants.push(`${kebab.slice(0, -KEBAB_SERVICE_SUFFIX.length)}-task-queue`);
  }

  return Array.from(new Set(variants));
}

export function buildQueueCandidates(
  declaredQueues: Iterable<string>,
  serviceNames: Iterable<string>
): string[] {
  const candidates = new Set<string>();
  for (const queue of declaredQueues) {
    if (queue) candidates.add(queue);
  }
  for (const serviceName of serviceNames) {
    for (const variant of queueNameVariants(serviceName)) {
      candidates.add(variant);
    }
  }
  return Array.from(candidates).sort();
}
