import { PDFParse } from "pdf-parse";
import { errorMessage, ParseError, ParseFailureReason } from "../core/errors";
import { TextExtractor } from "./textExtractor";

export interface ParserLike {
  getText(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  destroy(): Promise<void>;
}

interface PdfParseTextExtractorDeps {
  parserFactory?: (data: Buffer) => ParserLike;
}

function classify(error: unknown): ParseFailureReason {
  const name = error instanceof Error ? error.name : "";
  const message = errorMessage(error);
  if (name === "PasswordException" || /password|encrypt/i.test(message)) {
    return "encrypted";
  }
  if (name === "InvalidPDFException" || name === "FormatError" || /invalid pdf|pdf header|xref/i.test(message)) {
    return "corrupt";
  }
  return "unreadable";
}

const REASON_MESSAGES: Record<ParseFailureReason, string> = {
  encrypted: "PDF is password-protected and cannot be scanned",
  corrupt: "Invalid or corrupt PDF file",
  unreadable: "Failed to read PDF",
};

export class PdfParseTextExtractor implements TextExtractor {
  readonly name = "PdfParseTextExtractor";
  private readonly parserFactory: (data: Buffer) => ParserLike;

  constructor(deps?: PdfParseTextExtractorDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
  }

  async extractPages(data: Buffer): Promise<string[]> {
    const parsed = await this.readText(data);
    return [...parsed.pages].sort((a, b) => a.num - b.num).map((page) => page.text);
  }

  private async readText(data: Buffer): ReturnType<ParserLike["getText"]> {
    try {
      const parser = this.parserFactory(data);
      try {
        return await parser.getText();
      } finally {
        await parser.destroy().catch(() => undefined);
      }
    } catch (error) {
      const reason = classify(error);
      throw new ParseError(reason, `${REASON_MESSAGES[reason]}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
