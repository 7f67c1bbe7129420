/**
 * State management schemas
 *
 * Re-exports all Zod schemas for persisted state
 */

export {
  IntervalUnitSchema,
  CachePolicySchema,
  IntervalScheduleConfigSchema,
  CronScheduleConfigSchema,
  ScheduleConfigSchema,
  createDefaultScheduleConfig,
  getTargetSelector,
  getCanonicalSchedule,
  type CachePolicy,
  type IntervalScheduleConfig,
  type CronScheduleConfig,
  type ScheduleConfig,
  type CanonicalSchedule,
  type TargetSelector,
} from "./schedule-config.js";

export {
  DaemonStatusSchema,
  DaemonRunStateSchema,
  createStoppedDaemonState,
  type DaemonStatus,
  type DaemonRunState,
} from "./daemon-state.js";

export {
  ProcessingActionSchema,
  ProcessingRecordSchema,
  ProcessingEntrySchema,
  ProcessingCacheSchema,
  parseProcessingCache,
  type InvalidProcessingEntry,
  type ParsedProcessingCache,
  type ProcessingAction,
  type ProcessingRecord,
  type ProcessingCache,
} from "./processing-record.js";
