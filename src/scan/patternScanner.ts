import { errorMessage } from "../core/errors";
import { Logger } from "../observability";
import { FindingType } from "../types";
import { defaultMatchers } from "./patterns";
import { FindingCandidate, PatternMatcher, Scanner } from "./types";

interface PatternScannerDeps {
  logger?: Logger;
  matchers?: PatternMatcher[];
  onPageSkipped?: (pageNumber: number, error: unknown) => void;
}

/**
 * Runs every registered matcher over each page in registration order. A page
 * whose matching throws contributes nothing and the scan moves on.
 */
export class PatternScanner implements Scanner {
  readonly name = "PatternScanner";
  private readonly matchers: PatternMatcher[];
  private readonly logger?: Logger;
  private readonly onPageSkipped?: (pageNumber: number, error: unknown) => void;

  constructor(deps: PatternScannerDeps = {}) {
    this.matchers = [...(deps.matchers ?? defaultMatchers())];
    this.logger = deps.logger;
    this.onPageSkipped = deps.onPageSkipped;
  }

  register(matcher: PatternMatcher): this {
    this.matchers.push(matcher);
    return this;
  }

  scan(pages: readonly string[]): FindingCandidate[] {
    const findings: FindingCandidate[] = [];

    pages.forEach((text, index) => {
      const pageNumber = index + 1;
      try {
        findings.push(...this.scanPage(text, pageNumber));
      } catch (error) {
        this.logger?.warn("scan_page_skipped", { page: pageNumber, error: errorMessage(error) });
        this.onPageSkipped?.(pageNumber, error);
      }
    });

    return findings;
  }

  supportedTypes(): ReadonlySet<FindingType> {
    return new Set(this.matchers.map((matcher) => matcher.findingType));
  }

  private scanPage(text: string, pageNumber: number): FindingCandidate[] {
    if (typeof text !== "string") {
      throw new TypeError(`page ${pageNumber} text is not a string`);
    }
    if (text.length === 0) {
      return [];
    }

    // collect per page so a failing matcher drops the whole page
    const pageFindings: FindingCandidate[] = [];
    const location = `page ${pageNumber}`;
    for (const matcher of this.matchers) {
      const count = matcher.countMatches(text);
      for (let i = 0; i < count; i += 1) {
        pageFindings.push({
          findingType: matcher.findingType,
          location,
          confidence: Math.min(Math.max(matcher.confidence, 0), 1),
        });
      }
    }
    return pageFindings;
  }
}
