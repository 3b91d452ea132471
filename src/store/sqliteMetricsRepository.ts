import Database from "better-sqlite3";
import { Metric } from "../types";
import { normalizePage } from "./pagination";
import { guard, partitionMonth } from "./sqliteDatabase";
import { AverageFilter, MetricFilter, MetricsRepository, PageRequest } from "./types";

export const METRIC_RETENTION_DAYS = 90;

type MetricRow = {
  id: string;
  operation: string;
  duration_ms: number;
  timestamp: string;
  document_id: string | null;
  metadata: string;
};

type FilterParams = Record<string, string | number>;

function buildWhere(filter: MetricFilter): { clause: string; params: FilterParams } {
  const clauses: string[] = [];
  const params: FilterParams = {};

  if (filter.operation !== undefined) {
    clauses.push("operation = @operation");
    params.operation = filter.operation;
  }
  if (filter.documentId !== undefined) {
    clauses.push("document_id = @documentId");
    params.documentId = filter.documentId;
  }
  if (filter.start !== undefined) {
    clauses.push("timestamp >= @start");
    params.start = filter.start;
  }
  if (filter.end !== undefined) {
    clauses.push("timestamp <= @end");
    params.end = filter.end;
  }

  return { clause: clauses.length > 0 ? clauses.join(" AND ") : "1 = 1", params };
}

function parseMetadata(raw: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

function toMetric(row: MetricRow): Metric {
  const metric: Metric = {
    id: row.id,
    operation: row.operation,
    durationMs: row.duration_ms,
    timestamp: row.timestamp,
    metadata: parseMetadata(row.metadata),
  };
  if (row.document_id !== null) {
    metric.documentId = row.document_id;
  }
  return metric;
}

/**
 * Metric rows expire after {@link METRIC_RETENTION_DAYS}. Expired rows are
 * deleted when the repository opens and before every insert.
 */
export class SqliteMetricsRepository implements MetricsRepository {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(db: Database.Database, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
    this.purgeExpired();
  }

  async store(metric: Metric): Promise<void> {
    this.purgeExpired();
    guard("store metric", () => {
      this.db
        .prepare(
          `
          INSERT INTO metrics (id, operation, duration_ms, timestamp, document_id, metadata, partition_month)
          VALUES (@id, @operation, @durationMs, @timestamp, @documentId, @metadata, @partitionMonth)
        `,
        )
        .run({
          id: metric.id,
          operation: metric.operation,
          durationMs: metric.durationMs,
          timestamp: metric.timestamp,
          documentId: metric.documentId ?? null,
          metadata: JSON.stringify(metric.metadata),
          partitionMonth: partitionMonth(metric.timestamp),
        });
    });
  }

  async query(filter: MetricFilter = {}, page?: PageRequest): Promise<Metric[]> {
    const { limit, offset } = normalizePage(page);
    const { clause, params } = buildWhere(filter);
    return guard("query metrics", () =>
      this.db
        .prepare<FilterParams, MetricRow>(
          `
          SELECT id, operation, duration_ms, timestamp, document_id, metadata
          FROM metrics
          WHERE ${clause}
          ORDER BY timestamp DESC, rowid DESC
          LIMIT @limit OFFSET @offset
        `,
        )
        .all({ ...params, limit, offset })
        .map(toMetric),
    );
  }

  async count(filter: MetricFilter = {}): Promise<number> {
    const { clause, params } = buildWhere(filter);
    return guard("count metrics", () => {
      const row = this.db
        .prepare<FilterParams, { count: number }>(`SELECT COUNT(*) AS count FROM metrics WHERE ${clause}`)
        .get(params);
      return row?.count ?? 0;
    });
  }

  async averageDuration(filter: AverageFilter = {}): Promise<number | undefined> {
    const { clause, params } = buildWhere(filter);
    return guard("average metric duration", () => {
      const row = this.db
        .prepare<FilterParams, { average: number | null }>(
          `SELECT AVG(duration_ms) AS average FROM metrics WHERE ${clause}`,
        )
        .get(params);
      return row?.average ?? undefined;
    });
  }

  private purgeExpired(): void {
    const cutoff = new Date(this.now().getTime() - METRIC_RETENTION_DAYS * 24 * 60 * 60 * 1000).toISOString();
    guard("expire metrics", () => {
      this.db.prepare("DELETE FROM metrics WHERE timestamp < ?").run(cutoff);
    });
  }
}
