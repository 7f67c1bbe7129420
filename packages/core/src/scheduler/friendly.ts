/**
 * Friendly schedule options
 *
 * Translates the shorthand accepted by `schedule configure` (`--daily`,
 * `--weekly`, `--monthly`, `--every`) into a canonical schedule.
 */

import type { CanonicalSchedule } from "../state/schemas/schedule-config.js";
import { validateCronExpression } from "./cron.js";
import { ScheduleValidationError } from "./errors.js";
import { isIntervalUnit, maxIntervalValue, type IntervalUnit } from "./interval.js";

/**
 * Friendly schedule options as received from the command line
 *
 * At most one group may be given.
 */
export interface FriendlyScheduleOptions {
  /** `--daily [HH:MM]`; true when given without a time */
  daily?: string | boolean;
  /** `--weekly DAY [HH:MM]` */
  weekly?: readonly string[];
  /** `--monthly DOM [HH:MM]` */
  monthly?: readonly string[];
  /** `--every N UNIT` */
  every?: readonly string[];
}

interface TimeOfDay {
  hour: number;
  minute: number;
}

const DAY_NUMBERS: Record<string, number> = {
  sun: 0,
  sunday: 0,
  mon: 1,
  monday: 1,
  tue: 2,
  tuesday: 2,
  wed: 3,
  wednesday: 3,
  thu: 4,
  thursday: 4,
  fri: 5,
  friday: 5,
  sat: 6,
  saturday: 6,
};

const TIME_PATTERN = /^(\d{1,2})(?::(\d{2}))?$/;

/**
 * Parse `HH:MM` or bare `HH`; undefined means midnight
 */
export function parseTimeOfDay(value: string | undefined, field: string): TimeOfDay {
  if (value === undefined) {
    return { hour: 0, minute: 0 };
  }

  const match = value.trim().match(TIME_PATTERN);
  if (!match) {
    throw new ScheduleValidationError(
      `Invalid time "${value}". Expected HH:MM (e.g., "08:30")`,
      field,
      value
    );
  }

  const hour = parseInt(match[1], 10);
  const minute = match[2] === undefined ? 0 : parseInt(match[2], 10);

  if (hour > 23) {
    throw new ScheduleValidationError(
      `Invalid hour ${hour} in time "${value}". Hour must be between 0 and 23`,
      field,
      value
    );
  }
  if (minute > 59) {
    throw new ScheduleValidationError(
      `Invalid minute ${minute} in time "${value}". Minute must be between 0 and 59`,
      field,
      value
    );
  }

  return { hour, minute };
}

/**
 * Map a day token ("mon", "Monday") to its cron day-of-week number (Sunday = 0)
 */
export function parseDayOfWeek(value: string): number {
  const key = value.trim().toLowerCase();
  if (!Object.hasOwn(DAY_NUMBERS, key)) {
    throw new ScheduleValidationError(
      `Unknown day "${value}". Expected one of: sun, mon, tue, wed, thu, fri, sat`,
      "weekly",
      value
    );
  }
  return DAY_NUMBERS[key];
}

function parseDayOfMonth(value: string): number {
  const trimmed = value.trim();
  const day = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(day) || day < 1 || day > 31) {
    throw new ScheduleValidationError(
      `Invalid day of month "${value}". Must be between 1 and 31`,
      "monthly",
      value
    );
  }
  return day;
}

function cron(time: TimeOfDay, dayOfMonth: string, dayOfWeek: string): CanonicalSchedule {
  const expression = `${time.minute} ${time.hour} ${dayOfMonth} * ${dayOfWeek}`;
  validateCronExpression(expression);
  return { schedule_type: "cron", cron_expression: expression };
}

function requireArgs(
  values: readonly string[],
  field: string,
  min: number,
  max: number,
  usage: string
): void {
  if (values.length < min || values.length > max) {
    throw new ScheduleValidationError(
      `Invalid --${field} arguments "${values.join(" ")}". Usage: --${field} ${usage}`,
      field,
      values.join(" ")
    );
  }
}

/**
 * Normalize an interval unit, accepting singular and plural forms
 */
export function normalizeIntervalUnit(value: string): string {
  const lower = value.trim().toLowerCase();
  return lower.endsWith("s") ? lower : `${lower}s`;
}

function checkIntervalLength(
  unit: IntervalUnit,
  value: number,
  field: string,
  input: string
): void {
  const max = maxIntervalValue(unit);
  if (value > max) {
    throw new ScheduleValidationError(
      `Interval of ${value} ${unit} is too long. Use at most ${max} ${unit}`,
      field,
      input
    );
  }
}

function parseEvery(values: readonly string[]): CanonicalSchedule {
  requireArgs(values, "every", 2, 2, "N {minutes|hours|days}");
  const [rawValue, rawUnit] = values;

  const trimmed = rawValue.trim();
  const value = /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(value) || value < 1) {
    throw new ScheduleValidationError(
      `Invalid interval value "${rawValue}". Must be a whole number of at least 1`,
      "every",
      rawValue
    );
  }

  const unit = normalizeIntervalUnit(rawUnit);
  if (!isIntervalUnit(unit)) {
    throw new ScheduleValidationError(
      `Unsupported interval unit "${rawUnit}". Use minutes, hours or days`,
      "every",
      rawUnit
    );
  }
  checkIntervalLength(unit, value, "every", rawValue);

  return { schedule_type: "interval", interval_unit: unit, interval_value: value };
}

/**
 * Convert friendly schedule options into a canonical schedule
 *
 * @returns The canonical schedule, or null when no friendly option was given
 * @throws {ScheduleValidationError} If an option is invalid or more than one is given
 *
 * @example
 * parseFriendlySchedule({ daily: "08:30" })
 * // { schedule_type: "cron", cron_expression: "30 8 * * *" }
 */
export function parseFriendlySchedule(
  options: FriendlyScheduleOptions
): CanonicalSchedule | null {
  const given = (["daily", "weekly", "monthly", "every"] as const).filter((key) => {
    const value = options[key];
    return value !== undefined && value !== false;
  });

  if (given.length === 0) {
    return null;
  }
  if (given.length > 1) {
    throw new ScheduleValidationError(
      `Only one of --daily, --weekly, --monthly or --every may be given (got ${given
        .map((key) => `--${key}`)
        .join(", ")})`,
      "schedule",
      given.join(",")
    );
  }

  const { daily, weekly, monthly, every } = options;

  if (daily !== undefined && daily !== false) {
    const time = parseTimeOfDay(daily === true ? undefined : daily, "daily");
    return cron(time, "*", "*");
  }

  if (weekly !== undefined) {
    requireArgs(weekly, "weekly", 1, 2, "DAY [HH:MM]");
    const day = parseDayOfWeek(weekly[0]);
    return cron(parseTimeOfDay(weekly[1], "weekly"), "*", String(day));
  }

  if (monthly !== undefined) {
    requireArgs(monthly, "monthly", 1, 2, "DOM [HH:MM]");
    const day = parseDayOfMonth(monthly[0]);
    return cron(parseTimeOfDay(monthly[1], "monthly"), String(day), "*");
  }

  return parseEvery(every ?? []);
}

/**
 * Validate a canonical schedule given directly with --schedule-type
 *
 * @throws {ScheduleValidationError} If the cron expression or interval is invalid
 */
export function validateCanonicalSchedule(schedule: CanonicalSchedule): void {
  if (schedule.schedule_type === "cron") {
    validateCronExpression(schedule.cron_expression);
    return;
  }

  if (!Number.isInteger(schedule.interval_value) || schedule.interval_value < 1) {
    throw new ScheduleValidationError(
      `Invalid interval value ${schedule.interval_value}. Must be a whole number of at least 1`,
      "interval_value",
      String(schedule.interval_value)
    );
  }
  if (!isIntervalUnit(schedule.interval_unit)) {
    throw new ScheduleValidationError(
      `Unsupported interval unit "${schedule.interval_unit}". Use minutes, hours or days`,
      "interval_unit",
      schedule.interval_unit
    );
  }
  checkIntervalLength(
    schedule.interval_unit,
    schedule.interval_value,
    "interval_value",
    String(schedule.interval_value)
  );
}
