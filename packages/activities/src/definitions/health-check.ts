import type { ActivityDefinition } from "@strand/types";

export const HEALTH_CHECK_ACTIVITY = "health_check_activity";

export const healthCheckActivity: ActivityDefinition = {
  name: HEALTH_CHECK_ACTIVITY,
  description: "Report that the activity worker is reachable",
  timeoutSeconds: 30,
  retryAttempts: 1,
  parameters: [],
  returns: { type: "string", description: "Health message" },
  run: async () => "Activity worker is healthy",
};
