import { describe, expect, it } from "vitest";
import { DocumentStatus } from "./models";
import { canTransition, isTerminal } from "./status";

const statuses: DocumentStatus[] = ["pending", "processing", "completed", "failed"];

describe("document status transitions", () => {
  it("allows only the forward lifecycle", () => {
    const allowed = statuses.flatMap((from) =>
      statuses.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`),
    );

    expect(allowed).toEqual(["pending->processing", "pending->failed", "processing->completed", "processing->failed"]);
  });

  it("marks completed and failed as terminal", () => {
    expect(statuses.filter(isTerminal)).toEqual(["completed", "failed"]);
  });
});
