import { describe, it, expect } from "vitest";
import {
  SchedulerError,
  IntervalParseError,
  ScheduleValidationError,
  AlreadyRunningError,
  ScheduleConfigError,
} from "../errors.js";

describe("SchedulerError", () => {
  it("creates error with message", () => {
    const error = new SchedulerError("test error message");

    expect(error.message).toBe("test error message");
    expect(error.name).toBe("SchedulerError");
    expect(error).toBeInstanceOf(Error);
  });

  it("preserves cause when provided", () => {
    const cause = new Error("original error");
    const error = new SchedulerError("wrapped error", { cause });

    expect(error.cause).toBe(cause);
  });

  it("has undefined cause when not provided", () => {
    expect(new SchedulerError("no cause").cause).toBeUndefined();
  });
});

describe("IntervalParseError", () => {
  it("creates error with message and input", () => {
    const error = new IntervalParseError("invalid duration", "5x");

    expect(error.name).toBe("IntervalParseError");
    expect(error.input).toBe("5x");
    expect(error).toBeInstanceOf(SchedulerError);
  });
});

describe("ScheduleValidationError", () => {
  it("carries the field and the offending input", () => {
    const error = new ScheduleValidationError("bad time", "daily", "25:00");

    expect(error.name).toBe("ScheduleValidationError");
    expect(error.field).toBe("daily");
    expect(error.input).toBe("25:00");
    expect(error).toBeInstanceOf(SchedulerError);
  });
});

describe("AlreadyRunningError", () => {
  it("names the running PID and how to stop it", () => {
    const error = new AlreadyRunningError(4242);

    expect(error.name).toBe("AlreadyRunningError");
    expect(error.pid).toBe(4242);
    expect(error.message).toBe(
      "Scheduler is already running (PID 4242). Stop it first with 'pingctl schedule stop'."
    );
  });
});

describe("ScheduleConfigError", () => {
  it("carries the schedule file path", () => {
    const error = new ScheduleConfigError("unreadable", "/state/schedule.json");

    expect(error.name).toBe("ScheduleConfigError");
    expect(error.path).toBe("/state/schedule.json");
    expect(error).toBeInstanceOf(SchedulerError);
  });
});
