import { DocumentStatus, TerminalStatus } from "./models";

function assertNever(value: never): never {
  throw new Error(`Unhandled document status: ${String(value)}`);
}

export function isTerminal(status: DocumentStatus): status is TerminalStatus {
  switch (status) {
    case "pending":
    case "processing":
      return false;
    case "completed":
    case "failed":
      return true;
    default:
      return assertNever(status);
  }
}

/**
 * Allowed lifecycle moves: pending -> processing | failed, processing ->
 * completed | failed. Terminal statuses accept nothing.
 */
export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  switch (from) {
    case "pending":
      return to === "processing" || to === "failed";
    case "processing":
      return to === "completed" || to === "failed";
    case "completed":
    case "failed":
      return false;
    default:
      return assertNever(from);
  }
}
