import crypto from "node:crypto";
import { Backends } from "../core/backends";
import { ScanError, StorageError, errorMessage } from "../core/errors";
import { Logger, MetricsRegistry } from "../observability";
import { FindingCandidate } from "../scan";
import { Document, Finding, Metric, MetricOperation, ProcessingResult, StatusUpdate } from "../types";
import { StagedUpload, TempIntake } from "./tempIntake";

export interface ProcessorDeps {
  backends: Backends;
  intake: TempIntake;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
  generateId?: () => string;
}

export interface UploadInput {
  content: Uint8Array;
  filename: string;
  /** Size already checked by the upload validator. */
  declaredSize: number;
}

type ScanOutcome =
  | { status: "completed"; findingsCount: number }
  | { status: "failed"; findingsCount: number; errorMessage: string };

function toStorageError(operation: string, error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
}

function failure(message: string, findingsCount = 0): ScanOutcome {
  return { status: "failed", findingsCount, errorMessage: message };
}

/** Resolves to the storage error instead of throwing it. */
async function tryTransition(
  deps: ProcessorDeps,
  documentId: string,
  update: StatusUpdate,
): Promise<StorageError | undefined> {
  try {
    await deps.backends.documents.updateStatus(documentId, update);
  } catch (error) {
    const storageError = toStorageError(`update status to ${update.status}`, error);
    deps.logger.error("status_write_failed", { documentId, status: update.status, error: storageError.message });
    return storageError;
  }
  deps.logger.debug("document_status_changed", { documentId, status: update.status });
  return undefined;
}

/** Metric writes never fail the upload; a failure is logged and counted. */
async function recordMetric(
  deps: ProcessorDeps,
  operation: MetricOperation,
  durationMs: number,
  documentId: string,
  metadata: Record<string, unknown>,
): Promise<void> {
  const metric: Metric = {
    id: (deps.generateId ?? crypto.randomUUID)(),
    operation,
    durationMs,
    timestamp: (deps.now ?? (() => new Date()))().toISOString(),
    documentId,
    metadata,
  };

  try {
    await deps.backends.metrics.store(metric);
  } catch (error) {
    deps.metrics.incrementCounter("metric_write_failures");
    deps.logger.warn("metric_write_failed", { documentId, operation, error: errorMessage(error) });
  }
}

async function extractAndScan(backends: Backends, data: Buffer): Promise<FindingCandidate[]> {
  try {
    const pages = await backends.extractor.extractPages(data);
    const candidates = backends.scanner.scan(pages);
    const outOfRange = candidates.find((candidate) => !(candidate.confidence >= 0 && candidate.confidence <= 1));
    if (outOfRange) {
      throw new ScanError(`Scanner reported confidence ${outOfRange.confidence} outside [0, 1]`);
    }
    return candidates;
  } catch (error) {
    if (error instanceof ScanError) {
      throw error;
    }
    throw new ScanError(errorMessage(error), { cause: error });
  }
}

/**
 * Removes whatever findings a failed attempt left behind. Resolves to the
 * number still stored for the document.
 */
async function discardFindings(deps: ProcessorDeps, documentId: string, stored: number): Promise<number> {
  if (stored === 0) {
    return 0;
  }
  try {
    await deps.backends.findings.deleteByDocument(documentId);
    return 0;
  } catch (error) {
    deps.logger.error("finding_cleanup_failed", { documentId, stored, error: errorMessage(error) });
    return stored;
  }
}

async function storeFindings(
  deps: ProcessorDeps,
  documentId: string,
  candidates: FindingCandidate[],
): Promise<ScanOutcome> {
  const newId = deps.generateId ?? crypto.randomUUID;
  let stored = 0;
  for (const candidate of candidates) {
    const finding: Finding = {
      id: newId(),
      documentId,
      findingType: candidate.findingType,
      location: candidate.location,
      confidence: candidate.confidence,
    };
    try {
      await deps.backends.findings.store(finding);
    } catch (error) {
      deps.logger.error("finding_write_failed", { documentId, stored, error: errorMessage(error) });
      const remaining = await discardFindings(deps, documentId, stored);
      return failure(`Failed to store findings: ${errorMessage(error)}`, remaining);
    }
    stored += 1;
  }
  deps.metrics.incrementCounter("findings_stored", stored);
  return { status: "completed", findingsCount: stored };
}

async function scanStaged(deps: ProcessorDeps, document: Document, staged: StagedUpload): Promise<ScanOutcome> {
  const moveError = await tryTransition(deps, document.id, { status: "processing" });

  let scanMs = 0;
  let outcome: ScanOutcome;
  if (moveError) {
    outcome = failure(moveError.message);
  } else {
    try {
      const data = await staged.read();
      const stopScan = deps.metrics.startTimer("scan_ms");
      const candidates = await extractAndScan(deps.backends, data).finally(() => {
        scanMs = stopScan();
      });
      outcome = await storeFindings(deps, document.id, candidates);
    } catch (error) {
      const message = errorMessage(error) || "Scan failed";
      deps.logger.warn("scan_failed", { documentId: document.id, filename: document.filename, error: message });
      outcome = failure(message);
    }
  }

  await recordMetric(deps, "scan", scanMs, document.id, {
    findings_count: outcome.findingsCount,
    scanner_type: deps.backends.scanner.name,
    status: outcome.status,
  });
  return outcome;
}

/**
 * Writes the terminal status. When a completed document cannot be marked so,
 * its findings are dropped and it is marked failed instead.
 */
async function settle(deps: ProcessorDeps, documentId: string, outcome: ScanOutcome): Promise<ScanOutcome> {
  if (outcome.status === "failed") {
    await tryTransition(deps, documentId, { status: "failed", errorMessage: outcome.errorMessage });
    return outcome;
  }

  const completeError = await tryTransition(deps, documentId, { status: "completed" });
  if (!completeError) {
    return outcome;
  }
  const remaining = await discardFindings(deps, documentId, outcome.findingsCount);
  await tryTransition(deps, documentId, { status: "failed", errorMessage: completeError.message });
  return failure(completeError.message, remaining);
}

/**
 * Runs one upload through the pipeline: persist a pending document, stage its
 * bytes, extract and scan, store findings and settle the document in a
 * terminal status. Every failure after the initial document write comes back
 * as a `failed` result; only that first write rejects, with a StorageError.
 */
export async function processUpload(deps: ProcessorDeps, input: UploadInput): Promise<ProcessingResult> {
  const { backends, logger, metrics, intake } = deps;
  const now = deps.now ?? (() => new Date());
  const document: Document = {
    id: (deps.generateId ?? crypto.randomUUID)(),
    filename: input.filename,
    uploadTime: now().toISOString(),
    status: "pending",
    fileSize: input.declaredSize,
  };

  try {
    await backends.documents.store(document);
  } catch (error) {
    logger.error("document_write_failed", { documentId: document.id, filename: document.filename, error: errorMessage(error) });
    throw toStorageError("store document", error);
  }
  logger.info("upload_received", { documentId: document.id, filename: document.filename, fileSize: document.fileSize });

  let staged: StagedUpload | undefined;
  try {
    const stopUpload = metrics.startTimer("upload_ms");
    let stageError: unknown;
    try {
      staged = await intake.stage(document.id, input.content);
    } catch (error) {
      stageError = error;
    }
    await recordMetric(deps, "upload", stopUpload(), document.id, {
      file_size: document.fileSize,
      filename: document.filename,
    });

    const scanned: ScanOutcome = staged
      ? await scanStaged(deps, document, staged)
      : failure(`Failed to stage upload: ${errorMessage(stageError)}`);
    const outcome = await settle(deps, document.id, scanned);

    metrics.incrementCounter(outcome.status === "completed" ? "uploads_completed" : "uploads_failed");
    logger.info("upload_processed", {
      documentId: document.id,
      status: outcome.status,
      findingsCount: outcome.findingsCount,
    });

    return {
      documentId: document.id,
      filename: document.filename,
      status: outcome.status,
      uploadTime: document.uploadTime,
      fileSize: document.fileSize,
      findingsCount: outcome.findingsCount,
      ...(outcome.status === "failed" ? { errorMessage: outcome.errorMessage } : {}),
    };
  } finally {
    if (staged) {
      await staged.release().catch((error: unknown) => {
        logger.warn("intake_release_failed", { documentId: document.id, error: errorMessage(error) });
      });
    }
  }
}
