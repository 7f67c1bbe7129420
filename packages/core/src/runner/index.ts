/**
 * Job runner module
 *
 * Executes run cycles: resolve targets, consult the processing cache, enable
 * ping monitoring and summarize the outcome.
 */

export type {
  MonitoringPlatform,
  TokenSource,
  VmOutcome,
  VmResult,
  RunFailure,
  RunSummary,
  CycleRunner,
} from "./types.js";

export { RunnerError, InventoryError, CycleLockError } from "./errors.js";

export {
  JobRunner,
  CYCLE_LOCK_NAME,
  formatRunSummary,
  type JobRunnerOptions,
} from "./job-runner.js";
