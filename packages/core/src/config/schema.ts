/**
 * Zod schema for pingctl.yaml
 *
 * Durations are written as `{integer}{s|m|h|d}` strings and come out of the
 * schema as milliseconds.
 */

import { z } from "zod";
import { parseDuration } from "../scheduler/interval.js";

// =============================================================================
// Building Blocks
// =============================================================================

/**
 * Duration string converted to milliseconds
 */
export const DurationSchema = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

/**
 * Host name or IP, with an optional port; no scheme or path
 */
export const HostSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9.-]+(:\d{1,5})?$/, {
    message: 'must be a host name or "host:port" without scheme or path',
  });

// =============================================================================
// Sections
// =============================================================================

export const OperationsAuthSchema = z
  .object({
    username: z.string().min(1),
    password: z.string().min(1),
    auth_source: z.string().min(1).optional(),
  })
  .strict();

export const RetrySchema = z
  .object({
    max_retries: z.number().int().min(0).default(3),
    base_delay_ms: z.number().int().positive().default(1000),
    max_delay_ms: z.number().int().positive().default(30000),
  })
  .strict();

export const OperationsSchema = z
  .object({
    host: HostSchema,
    auth: OperationsAuthSchema,
    request_timeout: DurationSchema.default("30s"),
    retry: RetrySchema.default({}),
    /** VMs processed in parallel during a run cycle */
    concurrency: z.number().int().min(1).max(32).default(1),
  })
  .strict();

export const TokenSettingsSchema = z
  .object({
    safety_margin: DurationSchema.default("60s"),
    default_ttl: DurationSchema.default("6h"),
  })
  .strict();

export const SchedulerSettingsSchema = z
  .object({
    poll_interval: DurationSchema.default("5s"),
    heartbeat_timeout: DurationSchema.default("2m"),
    lock_timeout: DurationSchema.default("10s"),
  })
  .strict();

// =============================================================================
// Root
// =============================================================================

export const PingctlConfigSchema = z
  .object({
    version: z.literal(1).default(1),
    operations: OperationsSchema,
    token: TokenSettingsSchema.default({}),
    scheduler: SchedulerSettingsSchema.default({}),
    /** Relative paths resolve against the config file's directory */
    state_dir: z.string().min(1).default(".pingctl"),
  })
  .strict();

// =============================================================================
// Types
// =============================================================================

export type OperationsAuth = z.infer<typeof OperationsAuthSchema>;
export type RetrySettings = z.infer<typeof RetrySchema>;
export type OperationsSettings = z.infer<typeof OperationsSchema>;
export type TokenSettings = z.infer<typeof TokenSettingsSchema>;
export type SchedulerSettings = z.infer<typeof SchedulerSettingsSchema>;
export type PingctlConfig = z.infer<typeof PingctlConfigSchema>;
export type PingctlConfigInput = z.input<typeof PingctlConfigSchema>;
