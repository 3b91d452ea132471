import { AppConfig } from "../config";
import { InMemoryDocumentRepository } from "./memoryDocumentRepository";
import { InMemoryFindingRepository } from "./memoryFindingRepository";
import { InMemoryMetricsRepository } from "./memoryMetricsRepository";
import { openDatabase } from "./sqliteDatabase";
import { SqliteDocumentRepository } from "./sqliteDocumentRepository";
import { SqliteFindingRepository } from "./sqliteFindingRepository";
import { SqliteMetricsRepository } from "./sqliteMetricsRepository";
import { DocumentRepository, FindingRepository, MetricsRepository } from "./types";

export interface Repositories {
  kind: AppConfig["backend"];
  documents: DocumentRepository;
  findings: FindingRepository;
  metrics: MetricsRepository;
  close(): Promise<void>;
}

export function createMemoryRepositories(): Repositories {
  return {
    kind: "memory",
    documents: new InMemoryDocumentRepository(),
    findings: new InMemoryFindingRepository(),
    metrics: new InMemoryMetricsRepository(),
    close: async () => undefined,
  };
}

/** One database handle shared by all three repositories. */
export function createSqliteRepositories(storePath: string, timeoutMs: number): Repositories {
  const db = openDatabase(storePath, { timeoutMs });
  return {
    kind: "sqlite",
    documents: new SqliteDocumentRepository(db),
    findings: new SqliteFindingRepository(db),
    metrics: new SqliteMetricsRepository(db),
    close: async () => {
      db.close();
    },
  };
}

export function createRepositories(config: AppConfig): Repositories {
  switch (config.backend) {
    case "memory":
      return createMemoryRepositories();
    case "sqlite":
      return createSqliteRepositories(config.storePath, config.storeTimeoutMs);
    default: {
      const unsupported: never = config.backend;
      throw new Error(`Unsupported storage backend: ${String(unsupported)}`);
    }
  }
}

export * from "./pagination";
export * from "./types";
export { InMemoryDocumentRepository, InMemoryFindingRepository, InMemoryMetricsRepository };
export { SqliteDocumentRepository, SqliteFindingRepository, SqliteMetricsRepository };
export { METRIC_RETENTION_DAYS } from "./sqliteMetricsRepository";
