import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import {
  applyScheduleUpdates,
  configureSchedule,
  getScheduleConfigPath,
  loadScheduleConfig,
} from "../schedule-config.js";
import { ScheduleConfigError, ScheduleValidationError } from "../errors.js";
import {
  createDefaultScheduleConfig,
  type ScheduleConfig,
} from "../../state/schemas/schedule-config.js";
import { FakeClock, createMockLogger, createTempDir } from "../../__tests__/fakes.js";

describe("schedule configuration", () => {
  let stateDir: string;
  let clock: FakeClock;

  beforeEach(async () => {
    stateDir = await createTempDir("pingctl-schedule-config");
    clock = new FakeClock("2025-06-01T10:00:00.000Z");
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  describe("loadScheduleConfig", () => {
    it("returns the default schedule when no file exists", async () => {
      expect(await loadScheduleConfig(stateDir)).toEqual({
        schedule_type: "interval",
        interval_unit: "days",
        interval_value: 1,
        target_all_vms: true,
        cache_policy: "use_cache",
        enabled: false,
        last_run: null,
        next_run: null,
      });
    });

    it("refuses an unparseable file", async () => {
      await writeFile(getScheduleConfigPath(stateDir), "{ broken", "utf-8");

      await expect(
        loadScheduleConfig(stateDir, { logger: createMockLogger() })
      ).rejects.toBeInstanceOf(ScheduleConfigError);
    });

    it("refuses a file with both target fields", async () => {
      await writeFile(
        getScheduleConfigPath(stateDir),
        JSON.stringify({
          schedule_type: "cron",
          cron_expression: "0 0 * * *",
          target_vms: ["web-01"],
          target_all_vms: true,
        }),
        "utf-8"
      );

      await expect(loadScheduleConfig(stateDir)).rejects.toThrow(
        /exactly one of target_vms or target_all_vms must be set/
      );
    });

    it("refuses an invalid cron expression", async () => {
      await writeFile(
        getScheduleConfigPath(stateDir),
        JSON.stringify({
          schedule_type: "cron",
          cron_expression: "0 25 * * *",
          target_all_vms: true,
        }),
        "utf-8"
      );

      await expect(loadScheduleConfig(stateDir)).rejects.toThrow(
        /invalid cron expression "0 25 \* \* \*"/
      );
    });

    it("refuses an interval beyond the maximum", async () => {
      await writeFile(
        getScheduleConfigPath(stateDir),
        JSON.stringify({
          schedule_type: "interval",
          interval_unit: "days",
          interval_value: 200000000,
          target_all_vms: true,
        }),
        "utf-8"
      );

      await expect(loadScheduleConfig(stateDir)).rejects.toThrow(
        /interval_value must be at most 3650 days/
      );
    });

    it("fills defaults for omitted optional fields", async () => {
      await writeFile(
        getScheduleConfigPath(stateDir),
        JSON.stringify({
          schedule_type: "cron",
          cron_expression: "0 9 * * 1",
          target_vms: ["web-01", "web-02"],
        }),
        "utf-8"
      );

      expect(await loadScheduleConfig(stateDir)).toEqual({
        schedule_type: "cron",
        cron_expression: "0 9 * * 1",
        target_vms: ["web-01", "web-02"],
        cache_policy: "use_cache",
        enabled: false,
        last_run: null,
        next_run: null,
      });
    });
  });

  describe("configureSchedule", () => {
    it("persists a cron schedule with an explicit target", async () => {
      const config = await configureSchedule(
        stateDir,
        {
          schedule: { schedule_type: "cron", cron_expression: "30 8 * * *" },
          target: { kind: "explicit", vmNames: ["web-01", "db-01"] },
          cachePolicy: "ignore_cache",
        },
        { clock }
      );

      expect(config).toEqual({
        schedule_type: "cron",
        cron_expression: "30 8 * * *",
        target_vms: ["web-01", "db-01"],
        cache_policy: "ignore_cache",
        enabled: false,
        last_run: null,
        next_run: null,
      });
      expect(JSON.parse(await readFile(getScheduleConfigPath(stateDir), "utf-8"))).toEqual(
        config
      );
    });

    it("round-trips through the file", async () => {
      const written = await configureSchedule(
        stateDir,
        { schedule: { schedule_type: "interval", interval_unit: "hours", interval_value: 6 } },
        { clock }
      );

      expect(await loadScheduleConfig(stateDir)).toEqual(written);
    });

    it("keeps unchanged parts of the existing schedule", async () => {
      await configureSchedule(
        stateDir,
        { target: { kind: "explicit", vmNames: ["web-01"] } },
        { clock }
      );
      const config = await configureSchedule(stateDir, { cachePolicy: "ignore_cache" }, { clock });

      expect(config.target_vms).toEqual(["web-01"]);
      expect(config.cache_policy).toBe("ignore_cache");
      expect(config.schedule_type).toBe("interval");
    });

    it("switches from explicit VMs back to all VMs", async () => {
      await configureSchedule(stateDir, { target: { kind: "explicit", vmNames: ["web-01"] } }, { clock });
      const config = await configureSchedule(stateDir, { target: { kind: "all" } }, { clock });

      expect(config.target_all_vms).toBe(true);
      expect(config.target_vms).toBeUndefined();
    });

    it("persists nothing when the schedule is invalid", async () => {
      await expect(
        configureSchedule(
          stateDir,
          { schedule: { schedule_type: "cron", cron_expression: "0 24 * * *" } },
          { clock }
        )
      ).rejects.toBeInstanceOf(ScheduleValidationError);

      expect(existsSync(getScheduleConfigPath(stateDir))).toBe(false);
    });

    it("persists nothing when the interval is too long to schedule", async () => {
      await expect(
        configureSchedule(
          stateDir,
          {
            schedule: { schedule_type: "interval", interval_unit: "days", interval_value: 200000000 },
          },
          { clock }
        )
      ).rejects.toBeInstanceOf(ScheduleValidationError);

      expect(existsSync(getScheduleConfigPath(stateDir))).toBe(false);
    });

    it("persists nothing when the target list is empty", async () => {
      await expect(
        configureSchedule(stateDir, { target: { kind: "explicit", vmNames: [] } }, { clock })
      ).rejects.toThrow("At least one VM name is required with --target-vms");

      expect(existsSync(getScheduleConfigPath(stateDir))).toBe(false);
    });

    it("replaces a corrupt file with a warning", async () => {
      await writeFile(getScheduleConfigPath(stateDir), "garbage", "utf-8");
      const logger = createMockLogger();

      const config = await configureSchedule(
        stateDir,
        { schedule: { schedule_type: "cron", cron_expression: "0 0 * * *" } },
        { clock, logger }
      );

      expect(config).toMatchObject({ schedule_type: "cron", cron_expression: "0 0 * * *" });
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe("applyScheduleUpdates", () => {
    const now = new Date("2025-06-01T10:00:00.000Z");

    function enabled(): ScheduleConfig {
      return {
        ...createDefaultScheduleConfig(),
        enabled: true,
        last_run: "2025-05-31T10:00:00.000Z",
        next_run: "2025-06-01T10:00:00.000Z",
      };
    }

    it("recomputes next_run when an enabled schedule's recurrence changes", () => {
      const updated = applyScheduleUpdates(
        enabled(),
        { schedule: { schedule_type: "interval", interval_unit: "minutes", interval_value: 15 } },
        now
      );

      expect(updated.next_run).toBe("2025-06-01T10:15:00.000Z");
      expect(updated.last_run).toBe("2025-05-31T10:00:00.000Z");
    });

    it("keeps next_run when the recurrence is unchanged", () => {
      const updated = applyScheduleUpdates(
        enabled(),
        {
          schedule: { schedule_type: "interval", interval_unit: "days", interval_value: 1 },
          cachePolicy: "ignore_cache",
        },
        now
      );

      expect(updated.next_run).toBe("2025-06-01T10:00:00.000Z");
    });

    it("does not schedule a disabled schedule", () => {
      const updated = applyScheduleUpdates(
        createDefaultScheduleConfig(),
        { schedule: { schedule_type: "interval", interval_unit: "hours", interval_value: 2 } },
        now
      );

      expect(updated.next_run).toBeNull();
    });

    it("drops the other schedule type's fields", () => {
      const updated = applyScheduleUpdates(
        createDefaultScheduleConfig(),
        { schedule: { schedule_type: "cron", cron_expression: "0 9 * * 1" } },
        now
      );

      expect(updated).not.toHaveProperty("interval_unit");
      expect(updated).not.toHaveProperty("interval_value");
    });
  });
});
