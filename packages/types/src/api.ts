// ──────────────────────────────────────────────
// Strand - API Response Types
// ──────────────────────────────────────────────

export interface ApiResponse<T> {
  success: true;
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export type ConfigSourceKind = "file" | "document" | "discovery";

export interface PipelineSummary {
  name: string;
  displayName: string;
  description: string | null;
  origin: "declared" | "inferred";
  steps: Array<{
    activityName: string;
    transformName: string;
    executionKind: "local" | "remote";
    taskQueue: string | null;
  }>;
}
