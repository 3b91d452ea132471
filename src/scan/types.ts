import { FindingType } from "../types";

/** A finding before it is bound to a stored document. */
export interface FindingCandidate {
  findingType: FindingType;
  location: string;
  confidence: number;
}

export interface PatternMatcher {
  findingType: FindingType;
  /** Number of matches in one page of text. */
  countMatches(text: string): number;
  /** Confidence reported for each match, within [0, 1]. */
  confidence: number;
}

export interface Scanner {
  readonly name: string;
  scan(pages: readonly string[]): FindingCandidate[];
  supportedTypes(): ReadonlySet<FindingType>;
}
