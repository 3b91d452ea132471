/**
 * Turns raw document bytes into ordered page texts. Implementations throw
 * ParseError when the document as a whole cannot be read.
 */
export interface TextExtractor {
  readonly name: string;
  extractPages(data: Buffer): Promise<string[]>;
}
