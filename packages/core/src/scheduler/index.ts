/**
 * Scheduler module
 *
 * Friendly schedule parsing, schedule descriptions, schedule and daemon state
 * persistence, and the scheduler daemon loop.
 */

export {
  SchedulerError,
  IntervalParseError,
  ScheduleValidationError,
  AlreadyRunningError,
  ScheduleConfigError,
} from "./errors.js";

export {
  parseDuration,
  INTERVAL_UNITS,
  isIntervalUnit,
  intervalToMilliseconds,
  MAX_INTERVAL_MS,
  maxIntervalValue,
  calculateNextIntervalRun,
  isScheduleDue,
  type IntervalUnit,
} from "./interval.js";

export {
  validateCronExpression,
  isValidCronExpression,
  calculateNextCronRun,
} from "./cron.js";

export {
  parseFriendlySchedule,
  validateCanonicalSchedule,
  parseTimeOfDay,
  parseDayOfWeek,
  normalizeIntervalUnit,
  type FriendlyScheduleOptions,
} from "./friendly.js";

export {
  formatScheduleDescription,
  formatTimeOfDay,
  describeTarget,
  describeCachePolicy,
  ordinal,
} from "./describe.js";

export { calculateNextRun, isSameSchedule } from "./next-run.js";

export { systemClock, type Clock } from "./clock.js";

export {
  SCHEDULE_CONFIG_FILE,
  getScheduleConfigPath,
  createScheduleStore,
  loadScheduleConfig,
  updateScheduleConfig,
  applyScheduleUpdates,
  configureSchedule,
  type ScheduleUpdates,
} from "./schedule-config.js";

export {
  DAEMON_STATE_FILE,
  getDaemonStatePath,
  createDaemonStateStore,
  getStaleReason,
  isDaemonAlive,
  inspectDaemonState,
  requestStop,
  type DaemonInspection,
} from "./daemon-state.js";

export {
  SCHEDULER_LOG_FILE,
  startDetached,
  type DetachedStartOptions,
  type DetachedStartResult,
} from "./daemon-process.js";

export { getSchedulerStatus } from "./status.js";

export { Scheduler } from "./scheduler.js";

export type {
  SchedulerOptions,
  SchedulerStateOptions,
  SchedulerStatusReport,
  StopRequestOptions,
  StopRequestResult,
} from "./types.js";
