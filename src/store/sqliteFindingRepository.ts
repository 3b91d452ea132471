import Database from "better-sqlite3";
import { StorageError } from "../core/errors";
import { Finding, FindingType, isFindingType } from "../types";
import { normalizePage } from "./pagination";
import { guard, partitionMonth } from "./sqliteDatabase";
import { FindingListRequest, FindingRepository } from "./types";

type FindingRow = {
  id: string;
  document_id: string;
  finding_type: string;
  location: string;
  confidence: number;
};

const SELECT_COLUMNS = "id, document_id, finding_type, location, confidence";

function toFinding(row: FindingRow): Finding {
  if (!isFindingType(row.finding_type)) {
    throw new StorageError(`Finding ${row.id} has unknown type: ${row.finding_type}`);
  }
  return {
    id: row.id,
    documentId: row.document_id,
    findingType: row.finding_type,
    location: row.location,
    confidence: row.confidence,
  };
}

export class SqliteFindingRepository implements FindingRepository {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async store(finding: Finding): Promise<void> {
    const createdAt = new Date().toISOString();
    guard("store finding", () => {
      this.db
        .prepare(
          `
          INSERT INTO findings (id, document_id, finding_type, location, confidence, created_at, partition_month)
          VALUES (@id, @documentId, @findingType, @location, @confidence, @createdAt, @partitionMonth)
        `,
        )
        .run({
          id: finding.id,
          documentId: finding.documentId,
          findingType: finding.findingType,
          location: finding.location,
          confidence: finding.confidence,
          createdAt,
          partitionMonth: partitionMonth(createdAt),
        });
    });
  }

  async getByDocument(documentId: string): Promise<Finding[]> {
    return guard("get findings", () =>
      this.db
        .prepare<[string], FindingRow>(
          `
          SELECT ${SELECT_COLUMNS}
          FROM findings
          WHERE document_id = ?
          ORDER BY confidence DESC, rowid ASC
        `,
        )
        .all(documentId)
        .map(toFinding),
    );
  }

  async listAll(request: FindingListRequest = {}): Promise<Finding[]> {
    const { limit, offset } = normalizePage(request);
    return guard("list findings", () => {
      if (request.findingType !== undefined) {
        return this.db
          .prepare<[string, number, number], FindingRow>(
            `
            SELECT ${SELECT_COLUMNS}
            FROM findings
            WHERE finding_type = ?
            ORDER BY confidence DESC, rowid ASC
            LIMIT ? OFFSET ?
          `,
          )
          .all(request.findingType, limit, offset)
          .map(toFinding);
      }

      return this.db
        .prepare<[number, number], FindingRow>(
          `
          SELECT ${SELECT_COLUMNS}
          FROM findings
          ORDER BY confidence DESC, rowid ASC
          LIMIT ? OFFSET ?
        `,
        )
        .all(limit, offset)
        .map(toFinding);
    });
  }

  async countAll(findingType?: FindingType): Promise<number> {
    return guard("count findings", () => {
      const row =
        findingType === undefined
          ? this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM findings").get()
          : this.db
              .prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM findings WHERE finding_type = ?")
              .get(findingType);
      return row?.count ?? 0;
    });
  }

  async deleteByDocument(documentId: string): Promise<number> {
    return guard("delete findings", () => {
      const result = this.db.prepare("DELETE FROM findings WHERE document_id = ?").run(documentId);
      return result.changes;
    });
  }

  async countByDocument(documentId: string): Promise<number> {
    return guard("count findings", () => {
      const row = this.db
        .prepare<[string], { count: number }>("SELECT COUNT(*) AS count FROM findings WHERE document_id = ?")
        .get(documentId);
      return row?.count ?? 0;
    });
  }
}
