import { Document, Finding, FindingType, Metric, StatusUpdate } from "../types";

export interface PageRequest {
  limit?: number;
  offset?: number;
}

export interface NormalizedPage {
  limit: number;
  offset: number;
}

export interface Page<T> {
  items: T[];
  limit: number;
  offset: number;
  total: number;
  returned: number;
}

export interface FindingListRequest extends PageRequest {
  findingType?: FindingType;
}

export interface MetricFilter {
  operation?: string;
  documentId?: string;
  start?: string;
  end?: string;
}

export type AverageFilter = Omit<MetricFilter, "documentId">;

export interface DocumentRepository {
  store(document: Document): Promise<void>;
  get(documentId: string): Promise<Document | undefined>;
  /** Throws NotFoundError for an unknown id and InvalidTransitionError for an illegal move. */
  updateStatus(documentId: string, update: StatusUpdate): Promise<void>;
  /** Newest upload first. */
  list(page?: PageRequest): Promise<Document[]>;
  count(): Promise<number>;
}

export interface FindingRepository {
  store(finding: Finding): Promise<void>;
  /** Highest confidence first; equal confidence keeps insertion order. */
  getByDocument(documentId: string): Promise<Finding[]>;
  listAll(request?: FindingListRequest): Promise<Finding[]>;
  countAll(findingType?: FindingType): Promise<number>;
  countByDocument(documentId: string): Promise<number>;
  /** Removes every finding of one document; resolves to the number removed. */
  deleteByDocument(documentId: string): Promise<number>;
}

export interface MetricsRepository {
  store(metric: Metric): Promise<void>;
  /** Newest first. Time bounds are inclusive. */
  query(filter?: MetricFilter, page?: PageRequest): Promise<Metric[]>;
  count(filter?: MetricFilter): Promise<number>;
  /** Resolves to undefined when no metric matches. */
  averageDuration(filter?: AverageFilter): Promise<number | undefined>;
}
