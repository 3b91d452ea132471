import path from "node:path";
import { ValidationError } from "../core/errors";

export const ALLOWED_EXTENSIONS: readonly string[] = [".pdf"];
export const ALLOWED_CONTENT_TYPES: readonly string[] = ["application/pdf"];

export interface UploadCandidate {
  filename?: string;
  contentType?: string;
  size: number;
}

export interface UploadLimits {
  maxUploadBytes: number;
}

/**
 * Checks run in a fixed order: filename, extension, content type, size. The
 * first failing check throws; otherwise the validated filename is returned.
 */
export function validateUpload(candidate: UploadCandidate, limits: UploadLimits): string {
  const { filename, contentType, size } = candidate;
  if (!filename) {
    throw new ValidationError("Filename is required", "MISSING_FILENAME");
  }

  if (!ALLOWED_EXTENSIONS.includes(path.extname(filename).toLowerCase())) {
    throw new ValidationError("Invalid file type. Only PDF files are allowed.", "INVALID_FILE_TYPE");
  }

  if (contentType && !ALLOWED_CONTENT_TYPES.includes(contentType)) {
    throw new ValidationError(
      `Invalid content type: ${contentType}. Expected: ${ALLOWED_CONTENT_TYPES.join(", ")}`,
      "INVALID_CONTENT_TYPE",
    );
  }

  if (size === 0) {
    throw new ValidationError("File is empty", "EMPTY_FILE");
  }

  if (size > limits.maxUploadBytes) {
    throw new ValidationError(
      `File size (${size} bytes) exceeds maximum allowed size of ${limits.maxUploadBytes} bytes.`,
      "FILE_TOO_LARGE",
    );
  }

  return filename;
}
