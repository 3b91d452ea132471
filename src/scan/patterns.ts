import { FindingType } from "../types";
import { PatternMatcher } from "./types";

export class RegexMatcher implements PatternMatcher {
  readonly findingType: FindingType;
  readonly confidence = 1.0;
  private readonly pattern: RegExp;

  constructor(findingType: FindingType, pattern: RegExp) {
    this.findingType = findingType;
    // matchAll needs the global flag
    this.pattern = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  }

  countMatches(text: string): number {
    return Array.from(text.matchAll(this.pattern)).length;
  }
}

export const SSN_PATTERN = /\b\d{3}-\d{2}-\d{4}\b/g;

export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

export function defaultMatchers(): PatternMatcher[] {
  return [new RegexMatcher("ssn", SSN_PATTERN), new RegexMatcher("email", EMAIL_PATTERN)];
}
