/**
 * pingctl schedule configure - Change the persisted schedule
 *
 * The recurrence is given either canonically (--schedule-type with interval
 * or cron options) or with one friendly option (--daily, --weekly,
 * --monthly, --every). Target and cache policy can be changed on their own.
 * Nothing is written unless every given option is valid.
 */

import {
  configureSchedule,
  describeCachePolicy,
  describeTarget,
  formatScheduleDescription,
  isIntervalUnit,
  loadLocalSettings,
  normalizeIntervalUnit,
  parseFriendlySchedule,
  ScheduleValidationError,
  type CanonicalSchedule,
  type ScheduleConfig,
  type ScheduleUpdates,
} from "@pingctl/core";
import { formatFields } from "../format.js";
import { createCommandLogger, type GlobalOptions } from "../runtime.js";

export interface ScheduleConfigureOptions extends GlobalOptions {
  scheduleType?: string;
  intervalUnit?: string;
  intervalValue?: string;
  cronExpression?: string;
  targetVms?: string[];
  targetAllVms?: boolean;
  useCache?: boolean;
  ignoreCache?: boolean;
  daily?: string | boolean;
  weekly?: string[];
  monthly?: string[];
  every?: string[];
}

function parseIntervalValue(raw: string): number {
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ScheduleValidationError(
      `Invalid interval value "${raw}". Must be a whole number of at least 1`,
      "interval_value",
      raw
    );
  }
  return parseInt(trimmed, 10);
}

/**
 * Build a canonical schedule from --schedule-type and its options
 *
 * The type is inferred when only interval or cron options are given.
 *
 * @returns null when no canonical option was given
 */
export function parseCanonicalOptions(
  options: ScheduleConfigureOptions
): CanonicalSchedule | null {
  const { scheduleType, intervalUnit, intervalValue, cronExpression } = options;
  const hasInterval = intervalUnit !== undefined || intervalValue !== undefined;
  const hasCron = cronExpression !== undefined;

  if (scheduleType === undefined && !hasInterval && !hasCron) {
    return null;
  }

  const type = (scheduleType ?? (hasCron ? "cron" : "interval")).trim().toLowerCase();

  if (type === "cron") {
    if (hasInterval) {
      throw new ScheduleValidationError(
        "--interval-unit and --interval-value do not apply to cron schedules",
        "schedule_type",
        type
      );
    }
    if (cronExpression === undefined) {
      throw new ScheduleValidationError(
        "--schedule-type cron requires --cron-expression",
        "cron_expression",
        ""
      );
    }
    return { schedule_type: "cron", cron_expression: cronExpression.trim() };
  }

  if (type === "interval") {
    if (hasCron) {
      throw new ScheduleValidationError(
        "--cron-expression does not apply to interval schedules",
        "schedule_type",
        type
      );
    }
    if (intervalUnit === undefined || intervalValue === undefined) {
      throw new ScheduleValidationError(
        "--schedule-type interval requires --interval-unit and --interval-value",
        "interval",
        `${intervalUnit ?? ""} ${intervalValue ?? ""}`.trim()
      );
    }
    const unit = normalizeIntervalUnit(intervalUnit);
    if (!isIntervalUnit(unit)) {
      throw new ScheduleValidationError(
        `Unsupported interval unit "${intervalUnit}". Use minutes, hours or days`,
        "interval_unit",
        intervalUnit
      );
    }
    return {
      schedule_type: "interval",
      interval_unit: unit,
      interval_value: parseIntervalValue(intervalValue),
    };
  }

  throw new ScheduleValidationError(
    `Unsupported schedule type "${scheduleType ?? type}". Use interval or cron`,
    "schedule_type",
    scheduleType ?? type
  );
}

/**
 * Translate command line options into schedule updates
 *
 * @throws {ScheduleValidationError} If options conflict, are invalid, or none was given
 */
export function buildScheduleUpdates(options: ScheduleConfigureOptions): ScheduleUpdates {
  const friendly = parseFriendlySchedule({
    daily: options.daily,
    weekly: options.weekly,
    monthly: options.monthly,
    every: options.every,
  });
  const canonical = parseCanonicalOptions(options);
  if (friendly !== null && canonical !== null) {
    throw new ScheduleValidationError(
      "Give either --schedule-type options or one of --daily, --weekly, --monthly or --every, not both",
      "schedule",
      canonical.schedule_type
    );
  }

  const updates: ScheduleUpdates = {};
  const schedule = friendly ?? canonical;
  if (schedule !== null) {
    updates.schedule = schedule;
  }

  if (options.targetVms !== undefined && options.targetAllVms) {
    throw new ScheduleValidationError(
      "Use either --target-vms or --target-all-vms, not both",
      "target",
      options.targetVms.join(",")
    );
  }
  if (options.targetAllVms) {
    updates.target = { kind: "all" };
  } else if (options.targetVms !== undefined) {
    updates.target = { kind: "explicit", vmNames: options.targetVms.map((name) => name.trim()) };
  }

  if (options.useCache && options.ignoreCache) {
    throw new ScheduleValidationError(
      "Use either --use-cache or --ignore-cache, not both",
      "cache_policy",
      "use_cache,ignore_cache"
    );
  }
  if (options.useCache) {
    updates.cachePolicy = "use_cache";
  } else if (options.ignoreCache) {
    updates.cachePolicy = "ignore_cache";
  }

  if (Object.keys(updates).length === 0) {
    throw new ScheduleValidationError(
      "Nothing to configure. Give a schedule, a target (--target-vms or --target-all-vms) or a cache option",
      "schedule",
      ""
    );
  }
  return updates;
}

/**
 * Render the configured schedule for the terminal
 */
export function formatScheduleConfig(config: ScheduleConfig): string[] {
  const fields: [string, string][] = [
    ["Schedule", formatScheduleDescription(config)],
    ["Target", describeTarget(config)],
    ["Cache", describeCachePolicy(config)],
  ];
  if (config.enabled && config.next_run !== null) {
    fields.push(["Next run", config.next_run]);
  }
  return formatFields(fields);
}

export async function scheduleConfigureCommand(
  options: ScheduleConfigureOptions
): Promise<ScheduleConfig> {
  const updates = buildScheduleUpdates(options);
  const { stateDir, scheduler: settings } = await loadLocalSettings({
    stateDir: options.state,
    configPath: options.config,
  });

  const config = await configureSchedule(stateDir, updates, {
    lockTimeoutMs: settings.lock_timeout,
    logger: createCommandLogger("scheduler", options),
  });

  console.log("Schedule updated");
  for (const line of formatScheduleConfig(config)) {
    console.log(line);
  }
  return config;
}
