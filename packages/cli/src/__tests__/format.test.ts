import { describe, it, expect } from "vitest";
import { formatFields, formatRunResults } from "../format.js";
import { makeSummary } from "../commands/__tests__/helpers.js";

describe("formatRunResults", () => {
  it("aligns VM names and describes every outcome", () => {
    const summary = makeSummary([
      { vm: "web-01", outcome: "ping_enabled" },
      { vm: "db-primary", outcome: "already_enabled" },
      { vm: "app-02", outcome: "skipped" },
      { vm: "app-03", outcome: "failed", error: "VM \"app-03\" was not found on the operations platform" },
    ]);

    expect(formatRunResults(summary)).toEqual([
      "  web-01      ping enabled",
      "  db-primary  already enabled",
      "  app-02      skipped (already processed)",
      '  app-03      failed: VM "app-03" was not found on the operations platform',
      "",
      "4 target(s): 2 succeeded, 1 failed, 1 skipped",
    ]);
  });
});

describe("formatFields", () => {
  it("pads labels to the longest one", () => {
    expect(
      formatFields([
        ["State", "running"],
        ["Next run", "2026-03-02T09:00:00.000Z"],
      ])
    ).toEqual(["State:    running", "Next run: 2026-03-02T09:00:00.000Z"]);
  });
});
