import { describe, it, expect } from "vitest";
import {
  parseDuration,
  isIntervalUnit,
  intervalToMilliseconds,
  calculateNextIntervalRun,
  isScheduleDue,
} from "../interval.js";
import { IntervalParseError } from "../errors.js";

// =============================================================================
// parseDuration - Valid inputs
// =============================================================================

describe("parseDuration", () => {
  describe("valid durations", () => {
    it("parses seconds correctly", () => {
      expect(parseDuration("5s")).toBe(5000);
      expect(parseDuration("30s")).toBe(30000);
    });

    it("parses minutes correctly", () => {
      expect(parseDuration("1m")).toBe(60000);
      expect(parseDuration("30m")).toBe(1800000);
    });

    it("parses hours correctly", () => {
      expect(parseDuration("1h")).toBe(3600000);
      expect(parseDuration("6h")).toBe(21600000);
    });

    it("parses days correctly", () => {
      expect(parseDuration("1d")).toBe(86400000);
      expect(parseDuration("7d")).toBe(604800000);
    });

    it("handles uppercase units", () => {
      expect(parseDuration("5S")).toBe(5000);
      expect(parseDuration("2M")).toBe(120000);
    });

    it("handles whitespace around the duration", () => {
      expect(parseDuration("  5m  ")).toBe(300000);
      expect(parseDuration("\t1h\t")).toBe(3600000);
    });
  });

  // ===========================================================================
  // parseDuration - Invalid inputs
  // ===========================================================================

  describe("empty string handling", () => {
    it("throws IntervalParseError for empty or whitespace-only input", () => {
      expect(() => parseDuration("")).toThrow(IntervalParseError);
      expect(() => parseDuration("")).toThrow(/cannot be empty/);
      expect(() => parseDuration("   ")).toThrow(IntervalParseError);
    });
  });

  describe("missing unit handling", () => {
    it("throws IntervalParseError for number without unit", () => {
      expect(() => parseDuration("30")).toThrow(/Missing time unit/);
    });

    it("includes the input in the error", () => {
      const error = (() => {
        try {
          parseDuration("42");
        } catch (e) {
          return e;
        }
        return null;
      })();

      expect(error).toBeInstanceOf(IntervalParseError);
      if (error instanceof IntervalParseError) {
        expect(error.input).toBe("42");
      }
    });
  });

  describe("invalid unit handling", () => {
    it("throws IntervalParseError for unknown units", () => {
      expect(() => parseDuration("5x")).toThrow(/Invalid time unit "x"/);
      expect(() => parseDuration("5ms")).toThrow(IntervalParseError);
      expect(() => parseDuration("5w")).toThrow(IntervalParseError);
    });

    it("lists valid units in the error message", () => {
      expect(() => parseDuration("5x")).toThrow(
        /s \(seconds\), m \(minutes\), h \(hours\), d \(days\)/
      );
    });
  });

  describe("non-positive values", () => {
    it("rejects zero and negative durations", () => {
      expect(() => parseDuration("0s")).toThrow(/must be a positive integer/);
      expect(() => parseDuration("-5m")).toThrow(/must be a positive integer/);
    });
  });

  describe("decimal value handling", () => {
    it("rejects decimal values and suggests integers", () => {
      expect(() => parseDuration("1.5m")).toThrow(/Decimal values are not supported/);
      expect(() => parseDuration("1.5m")).toThrow(/"90s" instead of "1.5m"/);
    });
  });

  it("rejects other malformed input", () => {
    expect(() => parseDuration("m5")).toThrow(/Invalid duration format "m5"/);
  });
});

// =============================================================================
// Interval schedules
// =============================================================================

describe("isIntervalUnit", () => {
  it("accepts minutes, hours and days only", () => {
    expect(isIntervalUnit("minutes")).toBe(true);
    expect(isIntervalUnit("hours")).toBe(true);
    expect(isIntervalUnit("days")).toBe(true);
    expect(isIntervalUnit("seconds")).toBe(false);
    expect(isIntervalUnit("weeks")).toBe(false);
  });
});

describe("intervalToMilliseconds", () => {
  it("converts each unit", () => {
    expect(intervalToMilliseconds("minutes", 30)).toBe(1_800_000);
    expect(intervalToMilliseconds("hours", 2)).toBe(7_200_000);
    expect(intervalToMilliseconds("days", 1)).toBe(86_400_000);
  });
});

describe("calculateNextIntervalRun", () => {
  it("adds the interval to the reference time", () => {
    const from = new Date("2025-01-01T00:00:00.000Z");

    expect(calculateNextIntervalRun(from, "minutes", 30).toISOString()).toBe(
      "2025-01-01T00:30:00.000Z"
    );
    expect(calculateNextIntervalRun(from, "days", 2).toISOString()).toBe(
      "2025-01-03T00:00:00.000Z"
    );
  });
});

describe("isScheduleDue", () => {
  const now = new Date("2025-01-01T12:00:00.000Z");

  it("is due when the next run is now or in the past", () => {
    expect(isScheduleDue(new Date("2025-01-01T12:00:00.000Z"), now)).toBe(true);
    expect(isScheduleDue(new Date("2025-01-01T11:59:59.000Z"), now)).toBe(true);
  });

  it("is not due when the next run is in the future", () => {
    expect(isScheduleDue(new Date("2025-01-01T12:00:01.000Z"), now)).toBe(false);
  });
});
