import { describe, it, expect } from "vitest";
import {
  AlreadyRunningError,
  AuthError,
  ConfigNotFoundError,
  InventoryError,
  ScheduleConfigError,
  ScheduleValidationError,
  UndefinedVariableError,
} from "@pingctl/core";
import {
  CliUsageError,
  ExitCode,
  RunFailuresError,
  exitCodeFor,
  isPromptAbort,
} from "../errors.js";

describe("exitCodeFor", () => {
  it.each([
    [new CliUsageError("both selectors"), ExitCode.Validation],
    [new ScheduleValidationError("bad", "every", "0 hours"), ExitCode.Validation],
    [new ConfigNotFoundError("/srv", []), ExitCode.Validation],
    [new UndefinedVariableError("OPS_PASSWORD", "operations.auth.password"), ExitCode.Validation],
    [new AlreadyRunningError(4242), ExitCode.AlreadyRunning],
    [new AuthError("Platform rejected a freshly acquired token"), ExitCode.Auth],
    [new RunFailuresError(1, 3), ExitCode.Failure],
    [new ScheduleConfigError("unreadable", "/srv/.pingctl/schedule.json"), ExitCode.Failure],
    [
      new InventoryError("ops.example.test", { cause: new Error("timed out") }),
      ExitCode.Failure,
    ],
    ["not an error", ExitCode.Failure],
  ])("maps %s to %i", (error, code) => {
    expect(exitCodeFor(error)).toBe(code);
  });
});

describe("isPromptAbort", () => {
  it("recognizes a cancelled prompt", () => {
    const error = new Error("User force closed the prompt with SIGINT");
    error.name = "ExitPromptError";

    expect(isPromptAbort(error)).toBe(true);
  });

  it("ignores other errors", () => {
    expect(isPromptAbort(new Error("boom"))).toBe(false);
    expect(isPromptAbort("User force closed")).toBe(false);
  });
});
