import { describe, it, expect } from "vitest";
import {
  formatScheduleDescription,
  formatTimeOfDay,
  describeTarget,
  describeCachePolicy,
  ordinal,
} from "../describe.js";
import { createDefaultScheduleConfig, type ScheduleConfig } from "../../state/schemas/schedule-config.js";

function cron(expression: string): string {
  return formatScheduleDescription({ schedule_type: "cron", cron_expression: expression });
}

describe("ordinal", () => {
  it("uses st, nd, rd and th suffixes", () => {
    expect([1, 2, 3, 4, 11, 12, 13, 21, 22, 23, 31].map(ordinal)).toEqual([
      "1st",
      "2nd",
      "3rd",
      "4th",
      "11th",
      "12th",
      "13th",
      "21st",
      "22nd",
      "23rd",
      "31st",
    ]);
  });
});

describe("formatTimeOfDay", () => {
  it("names midnight and noon", () => {
    expect(formatTimeOfDay(0, 0)).toBe("midnight");
    expect(formatTimeOfDay(12, 0)).toBe("noon");
  });

  it("uses a 12-hour clock", () => {
    expect(formatTimeOfDay(9, 0)).toBe("9am");
    expect(formatTimeOfDay(14, 30)).toBe("2:30pm");
    expect(formatTimeOfDay(0, 5)).toBe("12:05am");
    expect(formatTimeOfDay(12, 45)).toBe("12:45pm");
  });
});

describe("formatScheduleDescription", () => {
  describe("cron schedules", () => {
    it("describes daily schedules", () => {
      expect(cron("0 0 * * *")).toBe("Daily at midnight");
      expect(cron("0 12 * * *")).toBe("Daily at noon");
      expect(cron("30 14 * * *")).toBe("Daily at 2:30pm");
      expect(cron("0 9 * * *")).toBe("Daily at 9am");
    });

    it("describes weekly schedules", () => {
      expect(cron("0 9 * * 1")).toBe("Weekly on Monday at 9am");
      expect(cron("0 0 * * 0")).toBe("Weekly on Sunday at midnight");
      expect(cron("0 0 * * 7")).toBe("Weekly on Sunday at midnight");
      expect(cron("0 12 * * FRI")).toBe("Weekly on Friday at noon");
    });

    it("treats an out-of-range weekday as custom", () => {
      expect(cron("0 9 * * 8")).toBe("Custom schedule: 0 9 * * 8");
    });

    it("describes monthly schedules", () => {
      expect(cron("0 0 1 * *")).toBe("Monthly on the 1st at midnight");
      expect(cron("45 14 15 * *")).toBe("Monthly on the 15th at 2:45pm");
    });

    it("describes yearly schedules", () => {
      expect(cron("0 0 1 1 *")).toBe("Yearly on January 1st at midnight");
    });

    it("falls back to the raw expression", () => {
      expect(cron("*/15 * * * *")).toBe("Custom schedule: */15 * * * *");
      expect(cron("0 9 * * 1-5")).toBe("Custom schedule: 0 9 * * 1-5");
      expect(cron("0 9 1 * 1")).toBe("Custom schedule: 0 9 1 * 1");
    });

    it("is deterministic", () => {
      expect(cron("0 9 * * 1")).toBe(cron("0 9 * * 1"));
    });
  });

  describe("interval schedules", () => {
    it("pluralizes units", () => {
      expect(
        formatScheduleDescription({
          schedule_type: "interval",
          interval_unit: "minutes",
          interval_value: 30,
        })
      ).toBe("Every 30 minutes");
      expect(
        formatScheduleDescription({
          schedule_type: "interval",
          interval_unit: "days",
          interval_value: 1,
        })
      ).toBe("Every 1 day");
      expect(
        formatScheduleDescription({
          schedule_type: "interval",
          interval_unit: "hours",
          interval_value: 1,
        })
      ).toBe("Every 1 hour");
    });
  });
});

describe("describeTarget", () => {
  it("describes all VMs", () => {
    expect(describeTarget(createDefaultScheduleConfig())).toBe("All VMs");
  });

  it("lists explicit VMs in order", () => {
    const config: ScheduleConfig = {
      ...createDefaultScheduleConfig(),
      target_all_vms: undefined,
      target_vms: ["web-02", "web-01"],
    };

    expect(describeTarget(config)).toBe("2 VMs: web-02, web-01");
    expect(describeTarget({ ...config, target_vms: ["db-01"] })).toBe("1 VM: db-01");
  });
});

describe("describeCachePolicy", () => {
  it("describes both policies", () => {
    const config = createDefaultScheduleConfig();

    expect(describeCachePolicy(config)).toBe("Use cache (skip VMs already processed)");
    expect(describeCachePolicy({ ...config, cache_policy: "ignore_cache" })).toBe(
      "Ignore cache (process every VM)"
    );
  });
});
