/**
 * Human-readable schedule descriptions for status output
 *
 * Pure functions: the same configuration always yields the same text.
 */

import type {
  CanonicalSchedule,
  ScheduleConfig,
} from "../state/schemas/schedule-config.js";

const DAY_NAMES = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

const DAY_ABBREVIATIONS = ["SUN", "MON", "TUE", "WED", "THU", "FRI", "SAT"];

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

const SINGULAR_UNITS = { minutes: "minute", hours: "hour", days: "day" } as const;

const INTEGER = /^\d+$/;

/**
 * Format a number with its English ordinal suffix (1st, 2nd, 3rd, 11th, 22nd)
 */
export function ordinal(n: number): string {
  const lastTwo = n % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${n}th`;
  }
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

/**
 * Format a time of day on a 12-hour clock: midnight, noon, 9am, 2:30pm
 */
export function formatTimeOfDay(hour: number, minute: number): string {
  if (minute === 0 && hour === 0) return "midnight";
  if (minute === 0 && hour === 12) return "noon";

  const suffix = hour < 12 ? "am" : "pm";
  const displayHour = hour % 12 === 0 ? 12 : hour % 12;
  return minute === 0
    ? `${displayHour}${suffix}`
    : `${displayHour}:${String(minute).padStart(2, "0")}${suffix}`;
}

function dayOfWeekName(field: string): string | null {
  if (INTEGER.test(field)) {
    // cron accepts 7 as well as 0 for Sunday
    const day = parseInt(field, 10);
    return day <= 7 ? DAY_NAMES[day % 7] : null;
  }
  const index = DAY_ABBREVIATIONS.indexOf(field.toUpperCase());
  return index === -1 ? null : DAY_NAMES[index];
}

function describeCron(expression: string): string {
  const custom = `Custom schedule: ${expression}`;
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    return custom;
  }

  const [minute, hour, dayOfMonth, month, dayOfWeek] = fields;
  if (!INTEGER.test(minute) || !INTEGER.test(hour)) {
    return custom;
  }
  const time = formatTimeOfDay(parseInt(hour, 10), parseInt(minute, 10));

  if (dayOfMonth === "*" && month === "*" && dayOfWeek === "*") {
    return `Daily at ${time}`;
  }

  if (dayOfMonth === "*" && month === "*") {
    const day = dayOfWeekName(dayOfWeek);
    return day === null ? custom : `Weekly on ${day} at ${time}`;
  }

  if (!INTEGER.test(dayOfMonth) || dayOfWeek !== "*") {
    return custom;
  }
  const dom = ordinal(parseInt(dayOfMonth, 10));

  if (month === "*") {
    return `Monthly on the ${dom} at ${time}`;
  }

  if (INTEGER.test(month)) {
    const monthName = MONTH_NAMES[parseInt(month, 10) - 1];
    if (monthName !== undefined) {
      return `Yearly on ${monthName} ${dom} at ${time}`;
    }
  }

  return custom;
}

/**
 * Render a canonical schedule as prose
 *
 * @example
 * formatScheduleDescription({ schedule_type: "cron", cron_expression: "0 0 * * *" })
 * // "Daily at midnight"
 * formatScheduleDescription({ schedule_type: "interval", interval_unit: "minutes", interval_value: 30 })
 * // "Every 30 minutes"
 */
export function formatScheduleDescription(schedule: CanonicalSchedule): string {
  if (schedule.schedule_type === "interval") {
    const unit =
      schedule.interval_value === 1
        ? SINGULAR_UNITS[schedule.interval_unit]
        : schedule.interval_unit;
    return `Every ${schedule.interval_value} ${unit}`;
  }
  return describeCron(schedule.cron_expression);
}

/**
 * Render the VMs a schedule targets
 */
export function describeTarget(config: ScheduleConfig): string {
  if (config.target_all_vms === true || config.target_vms === undefined) {
    return "All VMs";
  }
  const count = config.target_vms.length;
  return `${count} VM${count === 1 ? "" : "s"}: ${config.target_vms.join(", ")}`;
}

/**
 * Render a schedule's cache policy
 */
export function describeCachePolicy(config: Pick<ScheduleConfig, "cache_policy">): string {
  return config.cache_policy === "use_cache"
    ? "Use cache (skip VMs already processed)"
    : "Ignore cache (process every VM)";
}
