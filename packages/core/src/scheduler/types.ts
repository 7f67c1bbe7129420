/**
 * Type definitions for the Scheduler module
 */

import type { FileLockOptions } from "../state/utils/lock.js";
import type { DaemonStatus } from "../state/schemas/daemon-state.js";
import type { CachePolicy } from "../state/schemas/schedule-config.js";
import type { CycleRunner } from "../runner/types.js";
import type { Logger } from "../utils/logger.js";
import type { ProcessAliveCheck } from "../utils/process.js";
import type { Clock } from "./clock.js";

// =============================================================================
// Shared Options
// =============================================================================

/**
 * Options shared by everything that reads or writes scheduler state files
 */
export interface SchedulerStateOptions {
  logger?: Logger;
  clock?: Clock;
  /** Bounded wait for per-file locks, in milliseconds. Default: 10000 */
  lockTimeoutMs?: number;
  /** Liveness check for recorded PIDs (testing) */
  isProcessAlive?: ProcessAliveCheck;
}

/**
 * Build lock options for a per-file lock from shared options
 */
export function toLockOptions(options: SchedulerStateOptions): FileLockOptions {
  return {
    timeoutMs: options.lockTimeoutMs ?? 10_000,
    isProcessAlive: options.isProcessAlive,
  };
}

// =============================================================================
// Scheduler Options
// =============================================================================

/**
 * Options for configuring the Scheduler
 */
export interface SchedulerOptions extends SchedulerStateOptions {
  /** State directory holding schedule.json and daemon.json */
  stateDir: string;

  /** Executes run cycles */
  jobRunner: CycleRunner;

  /**
   * Upper bound on each sleep of the loop, in milliseconds
   * Default: 5000 (5 seconds)
   */
  pollIntervalMs?: number;

  /**
   * Age after which a heartbeat is considered stale, in milliseconds
   * Default: 120000 (2 minutes)
   */
  heartbeatTimeoutMs?: number;

  /** PID recorded as the daemon owner. Default: process.pid */
  pid?: number;
}

// =============================================================================
// Status Types
// =============================================================================

/**
 * Snapshot of the scheduler returned by status()
 */
export interface SchedulerStatusReport {
  /** Daemon state, after stale-state correction */
  state: DaemonStatus;
  pid: number | null;
  startedAt: string | null;
  heartbeatAt: string | null;
  enabled: boolean;
  /** Human-readable schedule, e.g. "Daily at 9am" */
  schedule: string;
  target: string;
  cachePolicy: CachePolicy;
  lastRun: string | null;
  nextRun: string | null;
  lastError: string | null;
  /** Problems found while reading state, such as a dead daemon or a corrupt file */
  warnings: string[];
}

/**
 * Result of a cross-process stop request
 */
export type StopRequestResult =
  | { status: "not_running"; warning?: string }
  | { status: "stopped"; pid: number }
  | { status: "timeout"; pid: number };

export interface StopRequestOptions extends SchedulerStateOptions {
  /** Maximum time to wait for the daemon to exit. Default: 30000 */
  timeoutMs?: number;
  /** Delay between exit checks. Default: 250 */
  pollIntervalMs?: number;
  /** Heartbeat staleness threshold. Default: 120000 */
  heartbeatTimeoutMs?: number;
  /** Signal sender (testing). Default: process.kill */
  sendSignal?: (pid: number, signal: NodeJS.Signals) => void;
}
