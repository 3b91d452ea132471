import { Backends } from "../core/backends";
import { AverageFilter, FindingListRequest, MetricFilter, normalizePage, Page, PageRequest, toPage } from "../store";
import { Document, Finding, Metric } from "../types";

export interface DocumentFindings {
  documentId: string;
  total: number;
  findings: Finding[];
}

export type AverageDurationResult =
  | { operation: string | null; averageMs: number; noData?: undefined }
  | { operation: string | null; noData: true };

export async function getDocument(backends: Backends, documentId: string): Promise<Document | undefined> {
  return backends.documents.get(documentId);
}

export async function listDocuments(backends: Backends, request: PageRequest = {}): Promise<Page<Document>> {
  const page = normalizePage(request);
  const [items, total] = await Promise.all([backends.documents.list(page), backends.documents.count()]);
  return toPage(items, page, total);
}

/** Undefined when the document itself does not exist. */
export async function getFindingsForDocument(
  backends: Backends,
  documentId: string,
): Promise<DocumentFindings | undefined> {
  const document = await backends.documents.get(documentId);
  if (!document) {
    return undefined;
  }

  const findings = await backends.findings.getByDocument(documentId);
  return { documentId, total: findings.length, findings };
}

export async function listFindings(backends: Backends, request: FindingListRequest = {}): Promise<Page<Finding>> {
  const page = normalizePage(request);
  const [items, total] = await Promise.all([
    backends.findings.listAll({ ...page, findingType: request.findingType }),
    backends.findings.countAll(request.findingType),
  ]);
  return toPage(items, page, total);
}

export async function getMetrics(
  backends: Backends,
  filter: MetricFilter = {},
  request: PageRequest = {},
): Promise<Page<Metric>> {
  const page = normalizePage(request);
  const [items, total] = await Promise.all([backends.metrics.query(filter, page), backends.metrics.count(filter)]);
  return toPage(items, page, total);
}

export async function getAverageDuration(
  backends: Backends,
  filter: AverageFilter = {},
): Promise<AverageDurationResult> {
  const operation = filter.operation ?? null;
  const averageMs = await backends.metrics.averageDuration(filter);
  if (averageMs === undefined) {
    return { operation, noData: true };
  }
  return { operation, averageMs };
}
