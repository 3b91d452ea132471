import { describe, expect, it } from "vitest";
import { parseCliArgs } from "./index";

describe("parseCliArgs", () => {
  it("parses a paginated findings listing", () => {
    expect(parseCliArgs(["findings", "--type", "ssn", "--limit", "5"])).toEqual({
      command: "findings",
      args: [],
      configPath: undefined,
      backend: undefined,
      limit: 5,
      offset: undefined,
      documentId: undefined,
      findingType: "ssn",
      operation: undefined,
      start: undefined,
      end: undefined,
    });
  });

  it("keeps option values out of the positional arguments", () => {
    const parsed = parseCliArgs(["scan", "a.pdf", "--backend", "sqlite", "b.pdf"]);

    expect(parsed).toMatchObject({ command: "scan", args: ["a.pdf", "b.pdf"], backend: "sqlite" });
  });

  it("falls back to help", () => {
    expect(parseCliArgs(["documents", "--help"])).toBe("help");
    expect(parseCliArgs(["bogus"])).toBe("help");
    expect(parseCliArgs([])).toBe("help");
  });

  it("rejects unknown backends and finding types", () => {
    expect(() => parseCliArgs(["documents", "--backend", "postgres"])).toThrow("Unsupported backend: postgres");
    expect(() => parseCliArgs(["findings", "--type", "phone"])).toThrow("Unsupported finding type: phone");
  });

  it("normalises time bounds to ISO-8601 UTC", () => {
    expect(parseCliArgs(["average", "--operation", "scan", "--start", "2026-01-01"])).toMatchObject({
      operation: "scan",
      start: "2026-01-01T00:00:00.000Z",
    });
    expect(() => parseCliArgs(["metrics", "--end", "yesterday"])).toThrow(
      "--end expects an ISO-8601 timestamp, got: yesterday",
    );
  });
});
