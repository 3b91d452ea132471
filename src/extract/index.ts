export * from "./pdfParseTextExtractor";
export * from "./textExtractor";
