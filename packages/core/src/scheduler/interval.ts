/**
 * Interval utilities for the scheduler module
 *
 * Parses duration strings used in configuration ("30s", "5m", "2h") and
 * computes next run times for interval schedules (minutes, hours, days).
 */

import { IntervalParseError } from "./errors.js";

/**
 * Multipliers to convert duration units to milliseconds
 */
const DURATION_MULTIPLIERS: Record<string, number> = {
  s: 1000, // seconds
  m: 60 * 1000, // minutes
  h: 60 * 60 * 1000, // hours
  d: 24 * 60 * 60 * 1000, // days
};

const VALID_DURATION_UNITS = Object.keys(DURATION_MULTIPLIERS);

/**
 * Units accepted by interval schedules
 */
export const INTERVAL_UNITS = ["minutes", "hours", "days"] as const;

export type IntervalUnit = (typeof INTERVAL_UNITS)[number];

const INTERVAL_UNIT_MS: Record<IntervalUnit, number> = {
  minutes: DURATION_MULTIPLIERS.m,
  hours: DURATION_MULTIPLIERS.h,
  days: DURATION_MULTIPLIERS.d,
};

/**
 * Parse a duration string into milliseconds
 *
 * Supports the format `{number}{unit}` where:
 * - `number` is a positive integer
 * - `unit` is one of: s (seconds), m (minutes), h (hours), d (days)
 *
 * @throws {IntervalParseError} If the duration string is invalid
 *
 * @example
 * parseDuration("5s")  // returns 5000
 * parseDuration("5m")  // returns 300000
 * parseDuration("1h")  // returns 3600000
 */
export function parseDuration(duration: string): number {
  if (!duration || duration.trim() === "") {
    throw new IntervalParseError(
      'Duration cannot be empty. Expected format: "{number}{unit}" where unit is s/m/h/d (e.g., "30s", "5m")',
      duration
    );
  }

  const trimmed = duration.trim();
  const match = trimmed.match(/^(-?\d+)\s*([a-zA-Z]+)$/);

  if (!match) {
    if (/^\d+$/.test(trimmed)) {
      throw new IntervalParseError(
        `Missing time unit in duration "${duration}". Expected format: "{number}{unit}" where unit is s/m/h/d (e.g., "30s", "5m")`,
        duration
      );
    }

    if (/\d+\.\d+/.test(trimmed)) {
      throw new IntervalParseError(
        `Decimal values are not supported in duration "${duration}". Use integers only (e.g., "90s" instead of "1.5m")`,
        duration
      );
    }

    throw new IntervalParseError(
      `Invalid duration format "${duration}". Expected format: "{number}{unit}" where unit is s/m/h/d (e.g., "30s", "5m")`,
      duration
    );
  }

  const [, valueStr, unit] = match;
  const value = parseInt(valueStr, 10);
  const normalizedUnit = unit.toLowerCase();

  if (value <= 0) {
    throw new IntervalParseError(
      `Duration must be a positive integer: "${duration}"`,
      duration
    );
  }

  if (!VALID_DURATION_UNITS.includes(normalizedUnit)) {
    throw new IntervalParseError(
      `Invalid time unit "${unit}" in duration "${duration}". Valid units are: s (seconds), m (minutes), h (hours), d (days)`,
      duration
    );
  }

  return value * DURATION_MULTIPLIERS[normalizedUnit];
}

/**
 * Check whether a string names an interval schedule unit
 */
export function isIntervalUnit(value: string): value is IntervalUnit {
  return (INTERVAL_UNITS as readonly string[]).includes(value);
}

/**
 * Convert an interval schedule to milliseconds
 */
export function intervalToMilliseconds(unit: IntervalUnit, value: number): number {
  return value * INTERVAL_UNIT_MS[unit];
}

/**
 * Longest interval a schedule may use (ten years)
 */
export const MAX_INTERVAL_MS = 3650 * DURATION_MULTIPLIERS.d;

/**
 * Largest interval value allowed for a unit
 *
 * @example
 * maxIntervalValue("hours") // 87600
 */
export function maxIntervalValue(unit: IntervalUnit): number {
  return Math.floor(MAX_INTERVAL_MS / INTERVAL_UNIT_MS[unit]);
}

/**
 * Calculate the next run of an interval schedule
 *
 * The next run is always `from + interval`; interval schedules do not catch
 * up on runs missed while the scheduler was stopped.
 *
 * @example
 * calculateNextIntervalRun(new Date("2025-01-01T00:00:00Z"), "minutes", 30)
 * // returns 2025-01-01T00:30:00Z
 */
export function calculateNextIntervalRun(
  from: Date,
  unit: IntervalUnit,
  value: number
): Date {
  return new Date(from.getTime() + intervalToMilliseconds(unit, value));
}

/**
 * Check if a schedule is due to run
 *
 * @returns true if the schedule is due (nextRunAt <= now)
 */
export function isScheduleDue(nextRunAt: Date, now: Date): boolean {
  return nextRunAt.getTime() <= now.getTime();
}
