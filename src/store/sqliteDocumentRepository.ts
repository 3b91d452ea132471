import Database from "better-sqlite3";
import { InvalidTransitionError, NotFoundError, StorageError } from "../core/errors";
import { canTransition, Document, isDocumentStatus, StatusUpdate } from "../types";
import { normalizePage } from "./pagination";
import { guard, partitionMonth } from "./sqliteDatabase";
import { DocumentRepository, PageRequest } from "./types";

type DocumentRow = {
  id: string;
  filename: string;
  upload_time: string;
  status: string;
  file_size: number;
  error_message: string | null;
};

const SELECT_COLUMNS = "id, filename, upload_time, status, file_size, error_message";

function toDocument(row: DocumentRow): Document {
  if (!isDocumentStatus(row.status)) {
    throw new StorageError(`Document ${row.id} has unknown status: ${row.status}`);
  }

  const fields = {
    id: row.id,
    filename: row.filename,
    uploadTime: row.upload_time,
    fileSize: row.file_size,
  };
  if (row.status === "failed") {
    return { ...fields, status: "failed", errorMessage: row.error_message ?? "" };
  }
  return { ...fields, status: row.status };
}

export class SqliteDocumentRepository implements DocumentRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async store(document: Document): Promise<void> {
    guard("store document", () => {
      this.db
        .prepare(
          `
          INSERT INTO documents (id, filename, upload_time, status, file_size, error_message, partition_month)
          VALUES (@id, @filename, @uploadTime, @status, @fileSize, @errorMessage, @partitionMonth)
        `,
        )
        .run({
          id: document.id,
          filename: document.filename,
          uploadTime: document.uploadTime,
          status: document.status,
          fileSize: document.fileSize,
          errorMessage: document.errorMessage ?? null,
          partitionMonth: partitionMonth(document.uploadTime),
        });
    });
  }

  async get(documentId: string): Promise<Document | undefined> {
    return guard("get document", () => {
      const row = this.db
        .prepare<[string], DocumentRow>(`SELECT ${SELECT_COLUMNS} FROM documents WHERE id = ?`)
        .get(documentId);
      return row ? toDocument(row) : undefined;
    });
  }

  async updateStatus(documentId: string, update: StatusUpdate): Promise<void> {
    guard("update document status", () => {
      const selectStatus = this.db.prepare<[string], { status: string }>("SELECT status FROM documents WHERE id = ?");
      const updateStatement = this.db.prepare(
        `
        UPDATE documents
        SET status = @status, error_message = @errorMessage
        WHERE id = @id
      `,
      );

      // status check and write share one transaction
      const transition = this.db.transaction((id: string, next: StatusUpdate) => {
        const current = selectStatus.get(id);
        if (!current) {
          throw new NotFoundError("Document", id);
        }
        if (!isDocumentStatus(current.status) || !canTransition(current.status, next.status)) {
          throw new InvalidTransitionError(id, current.status, next.status);
        }
        updateStatement.run({
          id,
          status: next.status,
          errorMessage: next.status === "failed" ? next.errorMessage : null,
        });
      });

      transition(documentId, update);
    });
  }

  async list(page?: PageRequest): Promise<Document[]> {
    const { limit, offset } = normalizePage(page);
    return guard("list documents", () =>
      this.db
        .prepare<[number, number], DocumentRow>(
          `
          SELECT ${SELECT_COLUMNS}
          FROM documents
          ORDER BY upload_time DESC, rowid DESC
          LIMIT ? OFFSET ?
        `,
        )
        .all(limit, offset)
        .map(toDocument),
    );
  }

  async count(): Promise<number> {
    return guard("count documents", () => {
      const row = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM documents").get();
      return row?.count ?? 0;
    });
  }
}
