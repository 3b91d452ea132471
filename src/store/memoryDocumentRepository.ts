import { InvalidTransitionError, NotFoundError, StorageError } from "../core/errors";
import { canTransition, Document, StatusUpdate } from "../types";
import { normalizePage } from "./pagination";
import { DocumentRepository, PageRequest } from "./types";

interface Entry {
  seq: number;
  document: Document;
}

function applyStatus(document: Document, update: StatusUpdate): Document {
  const { id, filename, uploadTime, fileSize } = document;
  if (update.status === "failed") {
    return { id, filename, uploadTime, fileSize, status: "failed", errorMessage: update.errorMessage };
  }
  return { id, filename, uploadTime, fileSize, status: update.status };
}

/**
 * Process-local document store. Contents are gone once the process exits.
 * Method bodies never yield, so concurrent pipeline runs cannot interleave
 * inside a single write.
 */
export class InMemoryDocumentRepository implements DocumentRepository {
  private readonly documents = new Map<string, Entry>();
  private seq = 0;

  async store(document: Document): Promise<void> {
    if (this.documents.has(document.id)) {
      throw new StorageError(`store document failed: duplicate id ${document.id}`);
    }
    this.seq += 1;
    this.documents.set(document.id, { seq: this.seq, document: { ...document } });
  }

  async get(documentId: string): Promise<Document | undefined> {
    const entry = this.documents.get(documentId);
    return entry ? { ...entry.document } : undefined;
  }

  async updateStatus(documentId: string, update: StatusUpdate): Promise<void> {
    const entry = this.documents.get(documentId);
    if (!entry) {
      throw new NotFoundError("Document", documentId);
    }
    if (!canTransition(entry.document.status, update.status)) {
      throw new InvalidTransitionError(documentId, entry.document.status, update.status);
    }

    entry.document = applyStatus(entry.document, update);
  }

  async list(page?: PageRequest): Promise<Document[]> {
    const { limit, offset } = normalizePage(page);
    return [...this.documents.values()]
      .sort((a, b) => {
        if (a.document.uploadTime !== b.document.uploadTime) {
          return a.document.uploadTime < b.document.uploadTime ? 1 : -1;
        }
        return b.seq - a.seq;
      })
      .slice(offset, offset + limit)
      .map((entry) => ({ ...entry.document }));
  }

  async count(): Promise<number> {
    return this.documents.size;
  }
}
