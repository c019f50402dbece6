// ──────────────────────────────────────────────
// Strand - Control Plane Contract
// ──────────────────────────────────────────────

import type { TaskQueueDescription } from "@strand/types";

export interface ControlPlane {
  /** Resolves when the control plane answers; rejects otherwise. */
  checkConnection(): Promise<void>;
  describeTaskQueue(name: string): Promise<TaskQueueDescription>;
  close(): Promise<void>;
}
