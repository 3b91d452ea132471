import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import {
  getAverageDuration,
  getDocument,
  getFindingsForDocument,
  getMetrics,
  listDocuments,
  listFindings,
  processUpload,
  TempIntake,
} from "../processing";
import { MetricFilter, PageRequest } from "../store";
import { FindingType, ProcessingResult } from "../types";
import { validateUpload } from "../validation";
import { Backends } from "./backends";
import { ValidationError, errorMessage } from "./errors";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  backends: Backends;
  intake: TempIntake;
  logger: Logger;
  metrics: MetricsRegistry;
  out?: (text: string) => void;
}

function print(ctx: CommandContext, value: unknown): void {
  (ctx.out ?? console.log)(JSON.stringify(value, null, 2));
}

/** Validates, then scans each file in turn. Exit code 1 if any file was rejected. */
export async function runScan(ctx: CommandContext, filePaths: string[]): Promise<number> {
  ctx.logger.info("scan_start", { files: filePaths.length, backend: ctx.config.backend });
  const results: ProcessingResult[] = [];
  let rejected = 0;

  for (const filePath of filePaths) {
    const filename = path.basename(filePath);
    let content: Buffer;
    try {
      content = await fs.promises.readFile(filePath);
      validateUpload({ filename, size: content.length }, ctx.config);
    } catch (error) {
      rejected += 1;
      const code = error instanceof ValidationError ? error.code : "FILE_READ_ERROR";
      ctx.logger.warn("scan_file_rejected", {
        filename,
        code,
        error: errorMessage(error),
      });
      continue;
    }

    results.push(
      await processUpload(
        {
          backends: ctx.backends,
          intake: ctx.intake,
          logger: ctx.logger.child("processor", { source: filePath }),
          metrics: ctx.metrics,
        },
        { content, filename, declaredSize: content.length },
      ),
    );
  }

  print(ctx, results);
  ctx.logger.info("scan_complete", { processed: results.length, rejected });
  return rejected > 0 ? 1 : 0;
}

export async function runListDocuments(ctx: CommandContext, page: PageRequest): Promise<number> {
  print(ctx, await listDocuments(ctx.backends, page));
  return 0;
}

export async function runShowDocument(ctx: CommandContext, documentId: string): Promise<number> {
  const document = await getDocument(ctx.backends, documentId);
  if (!document) {
    ctx.logger.warn("document_not_found", { documentId });
    return 1;
  }

  const findings = await getFindingsForDocument(ctx.backends, documentId);
  print(ctx, { document, findings: findings?.findings ?? [] });
  return 0;
}

export async function runListFindings(
  ctx: CommandContext,
  options: PageRequest & { documentId?: string; findingType?: FindingType },
): Promise<number> {
  if (options.documentId !== undefined) {
    if (options.findingType !== undefined || options.limit !== undefined || options.offset !== undefined) {
      ctx.logger.error("findings_options_conflict", {
        documentId: options.documentId,
        error: "--document lists every finding of one document and takes no --type, --limit or --offset",
      });
      return 1;
    }
    const findings = await getFindingsForDocument(ctx.backends, options.documentId);
    if (!findings) {
      ctx.logger.warn("document_not_found", { documentId: options.documentId });
      return 1;
    }
    print(ctx, findings);
    return 0;
  }

  print(ctx, await listFindings(ctx.backends, options));
  return 0;
}

export async function runListMetrics(ctx: CommandContext, filter: MetricFilter, page: PageRequest): Promise<number> {
  print(ctx, await getMetrics(ctx.backends, filter, page));
  return 0;
}

export async function runAverage(ctx: CommandContext, filter: Omit<MetricFilter, "documentId">): Promise<number> {
  print(ctx, await getAverageDuration(ctx.backends, filter));
  return 0;
}
