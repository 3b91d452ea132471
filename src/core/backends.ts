import { AppConfig } from "../config";
import { PdfParseTextExtractor, TextExtractor } from "../extract";
import { Logger, MetricsRegistry } from "../observability";
import { PatternScanner, Scanner } from "../scan";
import { createRepositories, DocumentRepository, FindingRepository, MetricsRepository, Repositories } from "../store";

/**
 * Everything a request handler needs, built once at startup and closed once
 * at shutdown. Repositories always come from the same backend.
 */
export interface Backends {
  documents: DocumentRepository;
  findings: FindingRepository;
  metrics: MetricsRepository;
  scanner: Scanner;
  extractor: TextExtractor;
  describe(): string;
  close(): Promise<void>;
}

export interface BackendOverrides {
  repositories?: Repositories;
  scanner?: Scanner;
  extractor?: TextExtractor;
}

export function composeBackends(repositories: Repositories, scanner: Scanner, extractor: TextExtractor): Backends {
  let closed = false;
  return {
    documents: repositories.documents,
    findings: repositories.findings,
    metrics: repositories.metrics,
    scanner,
    extractor,
    describe: () =>
      `Backends(kind=${repositories.kind}, scanner=${scanner.name}, extractor=${extractor.name})`,
    close: async () => {
      if (closed) {
        return;
      }
      closed = true;
      await repositories.close();
    },
  };
}

export function createBackends(
  config: AppConfig,
  logger: Logger,
  metrics?: MetricsRegistry,
  overrides: BackendOverrides = {},
): Backends {
  const repositories = overrides.repositories ?? createRepositories(config);
  const scanner =
    overrides.scanner ??
    new PatternScanner({
      logger: logger.child("scanner"),
      onPageSkipped: () => metrics?.incrementCounter("pages_skipped"),
    });
  const extractor = overrides.extractor ?? new PdfParseTextExtractor();

  const backends = composeBackends(repositories, scanner, extractor);
  logger.info("backends_ready", { backends: backends.describe() });
  return backends;
}
