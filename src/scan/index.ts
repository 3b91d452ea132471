export * from "./patternScanner";
export * from "./patterns";
export * from "./types";
