import { StorageError } from "../core/errors";
import { Metric } from "../types";
import { normalizePage } from "./pagination";
import { AverageFilter, MetricFilter, MetricsRepository, PageRequest } from "./types";

interface Entry {
  seq: number;
  metric: Metric;
}

function matches(metric: Metric, filter: MetricFilter): boolean {
  if (filter.operation !== undefined && metric.operation !== filter.operation) {
    return false;
  }
  if (filter.documentId !== undefined && metric.documentId !== filter.documentId) {
    return false;
  }
  if (filter.start !== undefined && metric.timestamp < filter.start) {
    return false;
  }
  if (filter.end !== undefined && metric.timestamp > filter.end) {
    return false;
  }
  return true;
}

function copy(metric: Metric): Metric {
  return { ...metric, metadata: { ...metric.metadata } };
}

/** Keeps every metric for the life of the process; retention is a durable-store concern. */
export class InMemoryMetricsRepository implements MetricsRepository {
  private readonly metrics: Entry[] = [];
  private seq = 0;

  async store(metric: Metric): Promise<void> {
    if (this.metrics.some((entry) => entry.metric.id === metric.id)) {
      throw new StorageError(`store metric failed: duplicate id ${metric.id}`);
    }
    this.seq += 1;
    this.metrics.push({ seq: this.seq, metric: copy(metric) });
  }

  async query(filter: MetricFilter = {}, page?: PageRequest): Promise<Metric[]> {
    const { limit, offset } = normalizePage(page);
    return this.metrics
      .filter((entry) => matches(entry.metric, filter))
      .sort((a, b) => {
        if (a.metric.timestamp !== b.metric.timestamp) {
          return a.metric.timestamp < b.metric.timestamp ? 1 : -1;
        }
        return b.seq - a.seq;
      })
      .slice(offset, offset + limit)
      .map((entry) => copy(entry.metric));
  }

  async count(filter: MetricFilter = {}): Promise<number> {
    return this.metrics.filter((entry) => matches(entry.metric, filter)).length;
  }

  async averageDuration(filter: AverageFilter = {}): Promise<number | undefined> {
    const selected = this.metrics.filter((entry) => matches(entry.metric, filter));
    if (selected.length === 0) {
      return undefined;
    }

    const total = selected.reduce((acc, entry) => acc + entry.metric.durationMs, 0);
    return total / selected.length;
  }
}
