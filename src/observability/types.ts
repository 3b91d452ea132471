export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogFields {
  documentId?: string;
  filename?: string;
  operation?: string;
  durationMs?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "uploads_completed"
  | "uploads_failed"
  | "findings_stored"
  | "pages_skipped"
  | "metric_write_failures";

export type MetricTimerName = "upload_ms" | "scan_ms";
