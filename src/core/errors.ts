export type ValidationErrorCode =
  | "MISSING_FILENAME"
  | "INVALID_FILE_TYPE"
  | "INVALID_CONTENT_TYPE"
  | "EMPTY_FILE"
  | "FILE_TOO_LARGE";

export class ValidationError extends Error {
  readonly code: ValidationErrorCode;

  constructor(message: string, code: ValidationErrorCode) {
    super(message);
    this.name = "ValidationError";
    this.code = code;
  }
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export type ParseFailureReason = "encrypted" | "corrupt" | "unreadable";

/** Raised by text extraction when the whole document cannot be read. */
export class ParseError extends Error {
  readonly reason: ParseFailureReason;

  constructor(reason: ParseFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
    this.reason = reason;
  }
}

export class ScanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScanError";
  }
}

export class NotFoundError extends Error {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
  }
}

export class InvalidTransitionError extends Error {
  constructor(documentId: string, from: string, to: string) {
    super(`Document ${documentId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
