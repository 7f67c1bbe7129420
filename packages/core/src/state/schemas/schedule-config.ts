/**
 * Zod schema for the persisted schedule configuration (schedule.json)
 *
 * A single document describing the canonical recurrence, the target VMs and
 * the cache policy, plus the last/next run bookkeeping written by the daemon.
 */

import { z } from "zod";
import { INTERVAL_UNITS, maxIntervalValue } from "../../scheduler/interval.js";
import { isValidCronExpression } from "../../scheduler/cron.js";

// =============================================================================
// Field Schemas
// =============================================================================

export const IntervalUnitSchema = z.enum(INTERVAL_UNITS);

/**
 * Whether the processing cache is honored for a run
 */
export const CachePolicySchema = z.enum(["use_cache", "ignore_cache"]);

const IsoTimestampSchema = z
  .string()
  .datetime({ offset: true, message: "must be a valid ISO datetime string" });

const ScheduleCommonShape = {
  /** Explicit, ordered VM identifiers */
  target_vms: z.array(z.string().min(1, "VM name cannot be empty")).min(1).optional(),
  /** Target every VM in the platform inventory */
  target_all_vms: z.boolean().optional(),
  cache_policy: CachePolicySchema.default("use_cache"),
  /** Set by schedule start, cleared by schedule stop */
  enabled: z.boolean().default(false),
  /** ISO timestamp of the last completed run */
  last_run: IsoTimestampSchema.nullable().default(null),
  /** ISO timestamp of the next scheduled run */
  next_run: IsoTimestampSchema.nullable().default(null),
  /** Error message from the last failed run cycle */
  last_error: z.string().nullable().optional(),
};

// =============================================================================
// Schedule Schemas
// =============================================================================

export const IntervalScheduleConfigSchema = z
  .object({
    schedule_type: z.literal("interval"),
    interval_unit: IntervalUnitSchema,
    interval_value: z.number().int().min(1, "interval_value must be at least 1"),
    ...ScheduleCommonShape,
  })
  .strict();

export const CronScheduleConfigSchema = z
  .object({
    schedule_type: z.literal("cron"),
    cron_expression: z.string().min(1, "cron_expression cannot be empty"),
    ...ScheduleCommonShape,
  })
  .strict();

/**
 * Top-level schedule configuration schema (schedule.json)
 *
 * Exactly one of `target_vms` / `target_all_vms: true` must be present, and
 * a cron expression must be a valid 5-field expression.
 */
export const ScheduleConfigSchema = z
  .discriminatedUnion("schedule_type", [
    IntervalScheduleConfigSchema,
    CronScheduleConfigSchema,
  ])
  .superRefine((config, ctx) => {
    const hasList = config.target_vms !== undefined;
    const hasAll = config.target_all_vms === true;
    if (hasList === hasAll) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "exactly one of target_vms or target_all_vms must be set",
        path: ["target_vms"],
      });
    }
    if (
      config.schedule_type === "interval" &&
      config.interval_value > maxIntervalValue(config.interval_unit)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `interval_value must be at most ${maxIntervalValue(config.interval_unit)} ${config.interval_unit}`,
        path: ["interval_value"],
      });
    }
    if (config.schedule_type === "cron" && !isValidCronExpression(config.cron_expression)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid cron expression "${config.cron_expression}"`,
        path: ["cron_expression"],
      });
    }
  });

// =============================================================================
// Type Exports
// =============================================================================

export type CachePolicy = z.infer<typeof CachePolicySchema>;
export type IntervalScheduleConfig = z.infer<typeof IntervalScheduleConfigSchema>;
export type CronScheduleConfig = z.infer<typeof CronScheduleConfigSchema>;
export type ScheduleConfig = z.infer<typeof ScheduleConfigSchema>;

/**
 * The recurrence part of a schedule configuration
 */
export type CanonicalSchedule =
  | Pick<IntervalScheduleConfig, "schedule_type" | "interval_unit" | "interval_value">
  | Pick<CronScheduleConfig, "schedule_type" | "cron_expression">;

/**
 * Which VMs a run cycle targets
 */
export type TargetSelector =
  | { kind: "all" }
  | { kind: "explicit"; vmNames: string[] };

// =============================================================================
// Defaults and Helpers
// =============================================================================

/**
 * Create the schedule used when no schedule.json exists: daily, all VMs, cache honored, disabled
 */
export function createDefaultScheduleConfig(): ScheduleConfig {
  return {
    schedule_type: "interval",
    interval_unit: "days",
    interval_value: 1,
    target_all_vms: true,
    cache_policy: "use_cache",
    enabled: false,
    last_run: null,
    next_run: null,
  };
}

/**
 * Extract the target selector from a schedule configuration
 */
export function getTargetSelector(config: ScheduleConfig): TargetSelector {
  if (config.target_vms !== undefined && config.target_all_vms !== true) {
    return { kind: "explicit", vmNames: [...config.target_vms] };
  }
  return { kind: "all" };
}

/**
 * Extract the canonical recurrence from a schedule configuration
 */
export function getCanonicalSchedule(config: ScheduleConfig): CanonicalSchedule {
  if (config.schedule_type === "interval") {
    return {
      schedule_type: "interval",
      interval_unit: config.interval_unit,
      interval_value: config.interval_value,
    };
  }
  return { schedule_type: "cron", cron_expression: config.cron_expression };
}
