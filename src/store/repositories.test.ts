import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidTransitionError, NotFoundError, StorageError } from "../core/errors";
import { Document, Finding, Metric } from "../types";
import { createMemoryRepositories, createSqliteRepositories, Repositories } from "./index";
import { IN_MEMORY_PATH } from "./sqliteDatabase";

function pendingDocument(id: string, uploadTime: string): Document {
  return { id, filename: `${id}.pdf`, uploadTime, status: "pending", fileSize: 2048 };
}

function finding(id: string, documentId: string, findingType: Finding["findingType"], confidence: number): Finding {
  return { id, documentId, findingType, location: "page 1", confidence };
}

const base = Date.now();
const minutesAgo = (minutes: number): string => new Date(base - minutes * 60_000).toISOString();

const backends: Array<[string, () => Repositories]> = [
  ["memory", () => createMemoryRepositories()],
  ["sqlite", () => createSqliteRepositories(IN_MEMORY_PATH, 1_000)],
];

describe.each(backends)("%s repositories", (_kind, create) => {
  let repos: Repositories;

  beforeEach(() => {
    repos = create();
  });

  afterEach(async () => {
    await repos.close();
  });

  describe("documents", () => {
    const d1 = pendingDocument("d1", "2026-01-01T10:00:00.000Z");
    const d2 = pendingDocument("d2", "2026-03-01T10:00:00.000Z");
    const d3 = pendingDocument("d3", "2026-02-01T10:00:00.000Z");
    const d4 = pendingDocument("d4", "2026-03-01T10:00:00.000Z");

    beforeEach(async () => {
      for (const document of [d1, d2, d3, d4]) {
        await repos.documents.store(document);
      }
    });

    it("returns a stored document and undefined for an unknown id", async () => {
      await expect(repos.documents.get("d1")).resolves.toEqual(d1);
      await expect(repos.documents.get("missing")).resolves.toBeUndefined();
    });

    it("returns identical data on repeated reads", async () => {
      const first = await repos.documents.get("d3");
      const second = await repos.documents.get("d3");
      expect(second).toEqual(first);
    });

    it("lists newest uploads first, later inserts first on ties", async () => {
      const ids = (await repos.documents.list()).map((document) => document.id);
      expect(ids).toEqual(["d4", "d2", "d3", "d1"]);
    });

    it("paginates with limit and offset", async () => {
      const ids = (await repos.documents.list({ limit: 2, offset: 1 })).map((document) => document.id);
      expect(ids).toEqual(["d2", "d3"]);
      await expect(repos.documents.list({ limit: 10, offset: 4 })).resolves.toEqual([]);
    });

    it("clamps out-of-range paging values", async () => {
      expect(await repos.documents.list({ limit: 5_000 })).toHaveLength(4);
      const ids = (await repos.documents.list({ limit: 0, offset: -3 })).map((document) => document.id);
      expect(ids).toEqual(["d4"]);
    });

    it("rejects a second document with the same id", async () => {
      await expect(repos.documents.store(pendingDocument("d1", "2026-04-01T10:00:00.000Z"))).rejects.toBeInstanceOf(
        StorageError,
      );
      await expect(repos.documents.get("d1")).resolves.toEqual(d1);
    });

    it("counts documents", async () => {
      await expect(repos.documents.count()).resolves.toBe(4);
    });

    it("moves through the lifecycle and keeps the failure message", async () => {
      await repos.documents.updateStatus("d1", { status: "processing" });
      await expect(repos.documents.get("d1")).resolves.toMatchObject({ status: "processing" });

      await repos.documents.updateStatus("d1", { status: "failed", errorMessage: "PDF is password-protected" });

      await expect(repos.documents.get("d1")).resolves.toEqual({
        ...d1,
        status: "failed",
        errorMessage: "PDF is password-protected",
      });
    });

    it("clears nothing else when completing", async () => {
      await repos.documents.updateStatus("d2", { status: "processing" });
      await repos.documents.updateStatus("d2", { status: "completed" });

      const stored = await repos.documents.get("d2");
      expect(stored).toEqual({ ...d2, status: "completed" });
      expect(stored?.errorMessage).toBeUndefined();
    });

    it("refuses to leave a terminal status", async () => {
      await repos.documents.updateStatus("d3", { status: "processing" });
      await repos.documents.updateStatus("d3", { status: "completed" });

      await expect(repos.documents.updateStatus("d3", { status: "processing" })).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
      await expect(repos.documents.get("d3")).resolves.toMatchObject({ status: "completed" });
    });

    it("refuses to skip processing on the way to completed", async () => {
      await expect(repos.documents.updateStatus("d4", { status: "completed" })).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
    });

    it("reports an unknown id on update", async () => {
      await expect(repos.documents.updateStatus("missing", { status: "processing" })).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });

  describe("findings", () => {
    const f1 = finding("f1", "doc-a", "ssn", 1);
    const f2 = finding("f2", "doc-a", "email", 0.5);
    const f3 = finding("f3", "doc-a", "ssn", 0.9);
    const f4 = finding("f4", "doc-b", "ssn", 1);
    const f5 = finding("f5", "doc-b", "email", 1);

    beforeEach(async () => {
      for (const item of [f1, f2, f3, f4, f5]) {
        await repos.findings.store(item);
      }
    });

    it("returns a document's findings by confidence", async () => {
      await expect(repos.findings.getByDocument("doc-a")).resolves.toEqual([f1, f3, f2]);
      await expect(repos.findings.getByDocument("doc-c")).resolves.toEqual([]);
    });

    it("filters by type", async () => {
      await expect(repos.findings.listAll({ findingType: "ssn", limit: 5, offset: 0 })).resolves.toEqual([f1, f4, f3]);
      await expect(repos.findings.countAll("ssn")).resolves.toBe(3);
      await expect(repos.findings.countAll("email")).resolves.toBe(2);
    });

    it("lists across documents with paging", async () => {
      await expect(repos.findings.listAll()).resolves.toEqual([f1, f4, f5, f3, f2]);
      await expect(repos.findings.listAll({ limit: 2, offset: 2 })).resolves.toEqual([f5, f3]);
      await expect(repos.findings.countAll()).resolves.toBe(5);
    });

    it("counts per document", async () => {
      await expect(repos.findings.countByDocument("doc-a")).resolves.toBe(3);
      await expect(repos.findings.countByDocument("doc-c")).resolves.toBe(0);
    });

    it("rejects a duplicate finding id", async () => {
      await expect(repos.findings.store(finding("f1", "doc-c", "email", 1))).rejects.toBeInstanceOf(StorageError);
      await expect(repos.findings.countAll()).resolves.toBe(5);
    });

    it("deletes one document's findings and leaves the rest", async () => {
      await expect(repos.findings.deleteByDocument("doc-a")).resolves.toBe(3);
      await expect(repos.findings.deleteByDocument("doc-a")).resolves.toBe(0);
      await expect(repos.findings.getByDocument("doc-a")).resolves.toEqual([]);
      await expect(repos.findings.listAll()).resolves.toEqual([f4, f5]);
    });
  });

  describe("metrics", () => {
    const m1: Metric = {
      id: "m1",
      operation: "upload",
      durationMs: 10,
      timestamp: minutesAgo(30),
      documentId: "doc-a",
      metadata: { file_size: 12, filename: "a.pdf" },
    };
    const m2: Metric = {
      id: "m2",
      operation: "scan",
      durationMs: 30,
      timestamp: minutesAgo(20),
      documentId: "doc-a",
      metadata: { findings_count: 2, status: "completed" },
    };
    const m3: Metric = { id: "m3", operation: "upload", durationMs: 20, timestamp: minutesAgo(10), documentId: "doc-b", metadata: {} };
    const m4: Metric = { id: "m4", operation: "upload", durationMs: 40, timestamp: minutesAgo(10), metadata: {} };

    it("reports no data before anything is recorded", async () => {
      await expect(repos.metrics.averageDuration({ operation: "upload" })).resolves.toBeUndefined();
      await expect(repos.metrics.query()).resolves.toEqual([]);
    });

    describe("with recorded metrics", () => {
      beforeEach(async () => {
        for (const metric of [m1, m2, m3, m4]) {
          await repos.metrics.store(metric);
        }
      });

      it("returns newest first, later inserts first on ties", async () => {
        await expect(repos.metrics.query()).resolves.toEqual([m4, m3, m2, m1]);
      });

      it("filters by operation and document", async () => {
        await expect(repos.metrics.query({ operation: "upload" })).resolves.toEqual([m4, m3, m1]);
        await expect(repos.metrics.count({ operation: "upload" })).resolves.toBe(3);
        await expect(repos.metrics.query({ documentId: "doc-a" })).resolves.toEqual([m2, m1]);
      });

      it("treats time bounds as inclusive", async () => {
        await expect(repos.metrics.query({ start: minutesAgo(20), end: minutesAgo(10) })).resolves.toEqual([m4, m3, m2]);
        await expect(repos.metrics.query({ end: minutesAgo(25) })).resolves.toEqual([m1]);
      });

      it("rejects a duplicate metric id", async () => {
        await expect(repos.metrics.store({ ...m1, timestamp: minutesAgo(1) })).rejects.toBeInstanceOf(StorageError);
        await expect(repos.metrics.count()).resolves.toBe(4);
      });

      it("paginates", async () => {
        await expect(repos.metrics.query({}, { limit: 2, offset: 1 })).resolves.toEqual([m3, m2]);
      });

      it("averages durations", async () => {
        expect(await repos.metrics.averageDuration({ operation: "upload" })).toBeCloseTo(70 / 3, 6);
        expect(await repos.metrics.averageDuration()).toBeCloseTo(25, 6);
        expect(await repos.metrics.averageDuration({ operation: "upload", start: minutesAgo(10) })).toBeCloseTo(30, 6);
        await expect(repos.metrics.averageDuration({ operation: "db_query" })).resolves.toBeUndefined();
      });
    });
  });
});
