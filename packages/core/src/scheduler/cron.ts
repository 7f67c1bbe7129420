/**
 * Cron expression utilities for the scheduler module
 *
 * Validates standard 5-field cron expressions field by field and computes the
 * next matching calendar instant with cron-parser.
 */

import { CronExpressionParser } from "cron-parser";
import { ScheduleValidationError } from "./errors.js";

interface CronField {
  name: string;
  min: number;
  max: number;
  /** Whether the field accepts names such as JAN or MON */
  allowsNames: boolean;
}

const CRON_FIELDS: readonly CronField[] = [
  { name: "minute", min: 0, max: 59, allowsNames: false },
  { name: "hour", min: 0, max: 23, allowsNames: false },
  { name: "day-of-month", min: 1, max: 31, allowsNames: false },
  { name: "month", min: 1, max: 12, allowsNames: true },
  { name: "day-of-week", min: 0, max: 7, allowsNames: true },
];

const NUMERIC_ITEM = /^(\*|\d+(?:-\d+)?)(?:\/(\d+))?$/;
const NAMED_ITEM = /^[a-zA-Z]{3}(?:-[a-zA-Z]{3})?$/;

/**
 * Validate a single comma-separated cron field
 */
function validateField(field: CronField, value: string, expression: string): void {
  for (const item of value.split(",")) {
    if (field.allowsNames && NAMED_ITEM.test(item)) {
      continue;
    }

    const match = item.match(NUMERIC_ITEM);
    if (!match) {
      throw new ScheduleValidationError(
        `Invalid ${field.name} field "${value}" in cron expression "${expression}"`,
        "cron_expression",
        expression
      );
    }

    const [, range, step] = match;
    if (step !== undefined && parseInt(step, 10) < 1) {
      throw new ScheduleValidationError(
        `Step must be at least 1 in ${field.name} field "${value}" of cron expression "${expression}"`,
        "cron_expression",
        expression
      );
    }

    if (range === "*") {
      continue;
    }

    const bounds = range.split("-").map((part) => parseInt(part, 10));
    for (const bound of bounds) {
      if (bound < field.min || bound > field.max) {
        throw new ScheduleValidationError(
          `Value ${bound} out of range ${field.min}-${field.max} for ${field.name} in cron expression "${expression}"`,
          "cron_expression",
          expression
        );
      }
    }

    if (bounds.length === 2 && bounds[0] > bounds[1]) {
      throw new ScheduleValidationError(
        `Range ${range} is reversed for ${field.name} in cron expression "${expression}"`,
        "cron_expression",
        expression
      );
    }
  }
}

/**
 * Validate a 5-field cron expression (minute hour day-of-month month day-of-week)
 *
 * @throws {ScheduleValidationError} If the expression is malformed or a field is out of range
 */
export function validateCronExpression(expression: string): void {
  const fields = expression.trim().split(/\s+/).filter((part) => part !== "");

  if (fields.length !== 5) {
    throw new ScheduleValidationError(
      `Cron expression "${expression}" must have exactly 5 fields (minute hour day-of-month month day-of-week)`,
      "cron_expression",
      expression
    );
  }

  fields.forEach((value, index) => validateField(CRON_FIELDS[index], value, expression));

  try {
    CronExpressionParser.parse(fields.join(" "));
  } catch (error) {
    throw new ScheduleValidationError(
      `Invalid cron expression "${expression}": ${error instanceof Error ? error.message : String(error)}`,
      "cron_expression",
      expression,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Check whether a string is a valid 5-field cron expression
 */
export function isValidCronExpression(expression: string): boolean {
  try {
    validateCronExpression(expression);
    return true;
  } catch {
    return false;
  }
}

/**
 * Calculate the next instant strictly after `from` that matches the expression
 *
 * Evaluated in the local time zone of the scheduler process.
 */
export function calculateNextCronRun(expression: string, from: Date): Date {
  const interval = CronExpressionParser.parse(expression.trim(), {
    currentDate: from,
  });
  let next = interval.next().toDate();
  while (next.getTime() <= from.getTime()) {
    next = interval.next().toDate();
  }
  return next;
}
