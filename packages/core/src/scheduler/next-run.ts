/**
 * Next-run computation for canonical schedules
 */

import type { CanonicalSchedule } from "../state/schemas/schedule-config.js";
import { calculateNextCronRun } from "./cron.js";
import { calculateNextIntervalRun } from "./interval.js";

/**
 * Calculate when a schedule next fires after `from`
 *
 * Interval schedules fire `from + interval`; cron schedules fire at the next
 * matching calendar instant strictly after `from`.
 */
export function calculateNextRun(schedule: CanonicalSchedule, from: Date): Date {
  if (schedule.schedule_type === "interval") {
    return calculateNextIntervalRun(from, schedule.interval_unit, schedule.interval_value);
  }
  return calculateNextCronRun(schedule.cron_expression, from);
}

/**
 * Compare the recurrence of two canonical schedules
 */
export function isSameSchedule(a: CanonicalSchedule, b: CanonicalSchedule): boolean {
  if (a.schedule_type === "interval" && b.schedule_type === "interval") {
    return a.interval_unit === b.interval_unit && a.interval_value === b.interval_value;
  }
  if (a.schedule_type === "cron" && b.schedule_type === "cron") {
    return a.cron_expression.trim() === b.cron_expression.trim();
  }
  return false;
}
