import crypto from "node:crypto";

/** Tags every log line of one CLI invocation, e.g. `scan-20260118T101502Z-3fa9c1`. */
export function createRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
  return `scan-${stamp}-${crypto.randomBytes(3).toString("hex")}`;
}
