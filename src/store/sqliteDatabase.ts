import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { InvalidTransitionError, NotFoundError, StorageError, errorMessage } from "../core/errors";

export const IN_MEMORY_PATH = ":memory:";

export interface SqliteOptions {
  timeoutMs: number;
}

export function openDatabase(dbPath: string, options: SqliteOptions): Database.Database {
  let target = dbPath;
  if (dbPath !== IN_MEMORY_PATH) {
    target = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
  }

  const db = new Database(target, { timeout: options.timeoutMs });
  db.pragma("journal_mode = WAL");
  initializeSchema(db);
  return db;
}

/** `YYYYMM` bucket for an ISO timestamp. */
export function partitionMonth(isoTimestamp: string): string {
  return `${isoTimestamp.slice(0, 4)}${isoTimestamp.slice(5, 7)}`;
}

/**
 * Runs a statement and reports driver failures as StorageError. Domain errors
 * raised inside `fn` pass through untouched.
 */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (
      error instanceof StorageError ||
      error instanceof NotFoundError ||
      error instanceof InvalidTransitionError
    ) {
      throw error;
    }
    throw new StorageError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
  }
}

function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS documents (
      id TEXT PRIMARY KEY,
      filename TEXT NOT NULL,
      upload_time TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
      file_size INTEGER NOT NULL,
      error_message TEXT NULL,
      partition_month TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS findings (
      id TEXT PRIMARY KEY,
      document_id TEXT NOT NULL,
      finding_type TEXT NOT NULL,
      location TEXT NOT NULL,
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      created_at TEXT NOT NULL,
      partition_month TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS metrics (
      id TEXT PRIMARY KEY,
      operation TEXT NOT NULL,
      duration_ms REAL NOT NULL,
      timestamp TEXT NOT NULL,
      document_id TEXT NULL,
      metadata TEXT NOT NULL,
      partition_month TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_documents_upload ON documents(upload_time, id);
    CREATE INDEX IF NOT EXISTS idx_documents_partition ON documents(partition_month);
    CREATE INDEX IF NOT EXISTS idx_findings_document ON findings(document_id, finding_type, id);
    CREATE INDEX IF NOT EXISTS idx_findings_type ON findings(finding_type);
    CREATE INDEX IF NOT EXISTS idx_metrics_operation ON metrics(operation, timestamp);
    CREATE INDEX IF NOT EXISTS idx_metrics_partition ON metrics(partition_month);
  `);
}
