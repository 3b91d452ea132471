import { StorageError } from "../core/errors";
import { Finding, FindingType } from "../types";
import { normalizePage } from "./pagination";
import { FindingListRequest, FindingRepository } from "./types";

function byConfidence(a: Finding, b: Finding): number {
  return b.confidence - a.confidence;
}

export class InMemoryFindingRepository implements FindingRepository {
  // insertion order doubles as the tie-break for equal confidence
  private findings: Finding[] = [];

  async store(finding: Finding): Promise<void> {
    if (this.findings.some((existing) => existing.id === finding.id)) {
      throw new StorageError(`store finding failed: duplicate id ${finding.id}`);
    }
    this.findings.push({ ...finding });
  }

  async deleteByDocument(documentId: string): Promise<number> {
    const before = this.findings.length;
    this.findings = this.findings.filter((finding) => finding.documentId !== documentId);
    return before - this.findings.length;
  }

  async getByDocument(documentId: string): Promise<Finding[]> {
    return this.findings
      .filter((finding) => finding.documentId === documentId)
      .sort(byConfidence)
      .map((finding) => ({ ...finding }));
  }

  async listAll(request: FindingListRequest = {}): Promise<Finding[]> {
    const { limit, offset } = normalizePage(request);
    return this.matching(request.findingType)
      .sort(byConfidence)
      .slice(offset, offset + limit)
      .map((finding) => ({ ...finding }));
  }

  async countAll(findingType?: FindingType): Promise<number> {
    return this.matching(findingType).length;
  }

  async countByDocument(documentId: string): Promise<number> {
    return this.findings.filter((finding) => finding.documentId === documentId).length;
  }

  private matching(findingType?: FindingType): Finding[] {
    if (findingType === undefined) {
      return [...this.findings];
    }
    return this.findings.filter((finding) => finding.findingType === findingType);
  }
}
