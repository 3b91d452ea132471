export type DocumentStatus = "pending" | "processing" | "completed" | "failed";

export type TerminalStatus = Extract<DocumentStatus, "completed" | "failed">;

export const FINDING_TYPES = ["ssn", "email"] as const;

export type FindingType = (typeof FINDING_TYPES)[number];

interface DocumentFields {
  id: string;
  filename: string;
  uploadTime: string;
  fileSize: number;
}

export interface ActiveDocument extends DocumentFields {
  status: Exclude<DocumentStatus, "failed">;
  errorMessage?: undefined;
}

export interface FailedDocument extends DocumentFields {
  status: "failed";
  errorMessage: string;
}

/**
 * An uploaded document. `errorMessage` exists exactly when the status is
 * `failed`.
 */
export type Document = ActiveDocument | FailedDocument;

/**
 * Status change applied through the document repository. A failure always
 * carries its message.
 */
export type StatusUpdate =
  | { status: "processing" }
  | { status: "completed" }
  | { status: "failed"; errorMessage: string };

/**
 * A located sensitive-data match. The matched text itself is never kept.
 */
export interface Finding {
  id: string;
  documentId: string;
  findingType: FindingType;
  location: string;
  confidence: number;
}

export type MetricOperation = "upload" | "scan" | (string & {});

export interface Metric {
  id: string;
  operation: MetricOperation;
  durationMs: number;
  timestamp: string;
  documentId?: string;
  metadata: Record<string, unknown>;
}

export interface ProcessingResult {
  documentId: string;
  filename: string;
  status: TerminalStatus;
  uploadTime: string;
  fileSize: number;
  findingsCount: number;
  errorMessage?: string;
}

export function isFindingType(value: string): value is FindingType {
  return FINDING_TYPES.some((type) => type === value);
}

export function isDocumentStatus(value: string): value is DocumentStatus {
  return value === "pending" || value === "processing" || value === "completed" || value === "failed";
}
