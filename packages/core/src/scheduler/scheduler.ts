/**
 * Scheduler daemon
 *
 * Runs the persisted schedule: waits until `next_run`, executes a run cycle
 * through the job runner, records `last_run`/`next_run` and repeats until
 * stopped. State shared with other pingctl processes lives in schedule.json
 * and daemon.json.
 */

import type { JsonStore } from "../state/store.js";
import {
  createStoppedDaemonState,
  type DaemonRunState,
  type DaemonStatus,
} from "../state/schemas/daemon-state.js";
import {
  getCanonicalSchedule,
  getTargetSelector,
  type ScheduleConfig,
} from "../state/schemas/schedule-config.js";
import type { CycleRunner, RunSummary } from "../runner/types.js";
import { createDefaultLogger, errorMessage, type Logger } from "../utils/logger.js";
import { isProcessAlive, type ProcessAliveCheck } from "../utils/process.js";
import { systemClock, type Clock } from "./clock.js";
import {
  createDaemonStateStore,
  getStaleReason,
  isDaemonAlive,
} from "./daemon-state.js";
import { formatScheduleDescription } from "./describe.js";
import { AlreadyRunningError, SchedulerError } from "./errors.js";
import { isScheduleDue } from "./interval.js";
import { calculateNextRun } from "./next-run.js";
import {
  createScheduleStore,
  loadScheduleConfig,
  updateScheduleConfig,
} from "./schedule-config.js";
import { getSchedulerStatus } from "./status.js";
import type {
  SchedulerOptions,
  SchedulerStateOptions,
  SchedulerStatusReport,
} from "./types.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Default upper bound on a single loop sleep (5 seconds)
 */
const DEFAULT_POLL_INTERVAL = 5000;

/**
 * Default heartbeat staleness threshold (2 minutes)
 */
const DEFAULT_HEARTBEAT_TIMEOUT = 120_000;

// =============================================================================
// Scheduler Class
// =============================================================================

/**
 * Scheduler for the recurring run cycle
 *
 * Lifecycle: stopped → starting → running → stopping → stopped.
 *
 * @example
 * ```typescript
 * const scheduler = new Scheduler({ stateDir: ".pingctl", jobRunner });
 *
 * process.on("SIGTERM", () => {
 *   scheduler.stop().catch((error) => console.error(error));
 * });
 *
 * // Blocks until stopped
 * await scheduler.start();
 * ```
 */
export class Scheduler {
  private readonly stateDir: string;
  private readonly jobRunner: CycleRunner;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly heartbeatTimeoutMs: number;
  private readonly pid: number;
  private readonly isProcessAlive: ProcessAliveCheck;
  private readonly stateOptions: SchedulerStateOptions;
  private readonly scheduleStore: JsonStore<ScheduleConfig>;
  private readonly daemonStore: JsonStore<DaemonRunState>;

  private state: DaemonStatus = "stopped";
  private abortController: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;
  private cycleCount = 0;

  constructor(options: SchedulerOptions) {
    this.stateDir = options.stateDir;
    this.jobRunner = options.jobRunner;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createDefaultLogger("scheduler");
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL;
    this.heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT;
    this.pid = options.pid ?? process.pid;
    this.isProcessAlive = options.isProcessAlive ?? isProcessAlive;
    this.stateOptions = {
      logger: this.logger,
      clock: this.clock,
      lockTimeoutMs: options.lockTimeoutMs,
      isProcessAlive: options.isProcessAlive,
    };
    this.scheduleStore = createScheduleStore(this.stateDir, this.stateOptions);
    this.daemonStore = createDaemonStateStore(this.stateDir, this.stateOptions);
  }

  /**
   * Lifecycle state of this scheduler instance
   */
  getState(): DaemonStatus {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  /**
   * Number of run cycles executed by the loop since start
   */
  getCycleCount(): number {
    return this.cycleCount;
  }

  /**
   * Start the scheduler and run the loop until stopped
   *
   * @throws {AlreadyRunningError} If a live scheduler already owns the state directory
   * @throws {ScheduleConfigError} If schedule.json is unreadable
   */
  async start(): Promise<void> {
    if (this.state !== "stopped") {
      throw new SchedulerError(`Scheduler is ${this.state}; cannot start again`);
    }

    this.state = "starting";
    try {
      await this.claimDaemonState();
    } catch (error) {
      this.state = "stopped";
      throw error;
    }

    let config: ScheduleConfig;
    try {
      await loadScheduleConfig(this.stateDir, this.stateOptions);
      const now = this.clock.now();
      config = await updateScheduleConfig(this.scheduleStore, (current) => ({
        ...current,
        enabled: true,
        next_run: calculateNextRun(getCanonicalSchedule(current), now).toISOString(),
      }));
      await this.daemonStore.update((current) =>
        current.pid === this.pid
          ? { ...current, status: "running", heartbeat_at: now.toISOString() }
          : current
      );
    } catch (error) {
      await this.releaseDaemonState();
      this.state = "stopped";
      throw error;
    }

    if (this.state === "starting") {
      this.state = "running";
    }
    this.abortController = new AbortController();

    this.logger.info(
      `Scheduler started (PID ${this.pid}): ${formatScheduleDescription(config)}, next run at ${config.next_run}`
    );

    this.loopPromise = this.runLoop(this.abortController.signal);
    await this.loopPromise;
  }

  /**
   * Stop the scheduler
   *
   * An in-flight run cycle is allowed to finish; only the wait for the next
   * cycle is interrupted.
   */
  async stop(): Promise<void> {
    if (this.state !== "running" && this.state !== "starting") {
      return;
    }

    this.state = "stopping";
    this.logger.info("Scheduler stopping...");

    await this.daemonStore.update((current) =>
      current.pid === this.pid && current.status !== "stopped"
        ? { ...current, status: "stopping" }
        : current
    );

    this.abortController?.abort();

    if (this.loopPromise !== null) {
      await this.loopPromise;
    }
  }

  /**
   * Execute one run cycle immediately
   *
   * Works whether or not the daemon is running; the job runner's cycle lock
   * keeps it from overlapping a scheduled cycle. `next_run` is not changed.
   *
   * @throws {ScheduleConfigError} If schedule.json is unreadable
   */
  async runNow(): Promise<RunSummary> {
    const config = await loadScheduleConfig(this.stateDir, this.stateOptions);
    const startedAt = this.clock.now().toISOString();

    let summary: RunSummary;
    try {
      summary = await this.jobRunner.run(getTargetSelector(config), config.cache_policy);
    } catch (error) {
      await updateScheduleConfig(this.scheduleStore, (current) => ({
        ...current,
        last_error: errorMessage(error),
      }));
      throw error;
    }

    await updateScheduleConfig(this.scheduleStore, (current) => ({
      ...current,
      last_run: startedAt,
      last_error: null,
    }));
    return summary;
  }

  /**
   * Report the scheduler state, correcting stale daemon state
   */
  async status(): Promise<SchedulerStatusReport> {
    return getSchedulerStatus(this.stateDir, {
      ...this.stateOptions,
      heartbeatTimeoutMs: this.heartbeatTimeoutMs,
    });
  }

  // ===========================================================================
  // Loop
  // ===========================================================================

  /**
   * Poll until stopped
   *
   * Errors inside one iteration (a lock timeout on daemon.json, an unwritable
   * schedule) are logged and retried after one poll interval.
   */
  private async runLoop(signal: AbortSignal): Promise<void> {
    try {
      while (this.state === "running" && !signal.aborted) {
        try {
          if (!(await this.heartbeat())) {
            break;
          }
          await this.tick(signal);
        } catch (error) {
          this.logger.error(`Scheduler loop error: ${errorMessage(error)}`);
          await this.clock.sleep(this.pollIntervalMs, signal);
        }
      }
    } finally {
      await this.shutdown();
    }
  }

  /**
   * One loop iteration after the heartbeat: run when due, otherwise wait
   */
  private async tick(signal: AbortSignal): Promise<void> {
    let config: ScheduleConfig;
    try {
      config = await loadScheduleConfig(this.stateDir, this.stateOptions);
    } catch (error) {
      this.logger.error(`Cannot read schedule: ${errorMessage(error)}`);
      await this.clock.sleep(this.pollIntervalMs, signal);
      return;
    }

    const now = this.clock.now();
    if (config.next_run === null) {
      await updateScheduleConfig(this.scheduleStore, (current) => ({
        ...current,
        next_run: calculateNextRun(getCanonicalSchedule(current), now).toISOString(),
      }));
      return;
    }

    const nextRun = new Date(config.next_run);
    if (isScheduleDue(nextRun, now)) {
      await this.executeCycle(config);
      return;
    }

    const waitMs = Math.min(this.pollIntervalMs, nextRun.getTime() - now.getTime());
    await this.clock.sleep(waitMs, signal);
  }

  /**
   * Run one scheduled cycle and record its bookkeeping
   *
   * Cycle failures are logged and recorded in `last_error`; they never end
   * the loop.
   */
  private async executeCycle(config: ScheduleConfig): Promise<void> {
    const startedAt = this.clock.now();
    this.cycleCount++;
    this.logger.info(`Starting scheduled run (${formatScheduleDescription(config)})`);

    const ticker = setInterval(() => {
      this.writeHeartbeat().catch((error: unknown) => {
        this.logger.warn(`Failed to write heartbeat: ${errorMessage(error)}`);
      });
    }, this.pollIntervalMs);
    ticker.unref();

    let lastError: string | null = null;
    try {
      const summary = await this.jobRunner.run(
        getTargetSelector(config),
        config.cache_policy
      );
      this.logger.info(
        `Scheduled run finished: ${summary.succeeded} succeeded, ${summary.skipped} skipped, ${summary.failed} failed`
      );
    } catch (error) {
      lastError = errorMessage(error);
      this.logger.error(`Scheduled run failed: ${lastError}`);
    } finally {
      clearInterval(ticker);
    }

    const finishedAt = this.clock.now();
    try {
      const updated = await updateScheduleConfig(this.scheduleStore, (current) => {
        const schedule = getCanonicalSchedule(current);
        let nextRun = calculateNextRun(schedule, startedAt);
        if (nextRun.getTime() <= finishedAt.getTime()) {
          nextRun = calculateNextRun(schedule, finishedAt);
        }
        return {
          ...current,
          last_run: startedAt.toISOString(),
          next_run: nextRun.toISOString(),
          last_error: lastError,
        };
      });
      this.logger.info(`Next run at ${updated.next_run}`);
    } catch (error) {
      this.logger.error(`Failed to record run: ${errorMessage(error)}`);
    }
  }

  // ===========================================================================
  // Daemon State
  // ===========================================================================

  /**
   * Record this process as the daemon owner, replacing stale state
   */
  private async claimDaemonState(): Promise<void> {
    let staleReason: string | null = null;
    const now = this.clock.now();

    await this.daemonStore.update((current) => {
      if (
        current.pid !== null &&
        isDaemonAlive(current, now, this.heartbeatTimeoutMs, this.isProcessAlive)
      ) {
        throw new AlreadyRunningError(current.pid);
      }
      staleReason = getStaleReason(current, now, this.heartbeatTimeoutMs, this.isProcessAlive);
      return {
        status: "starting",
        pid: this.pid,
        started_at: now.toISOString(),
        heartbeat_at: now.toISOString(),
      };
    });

    if (staleReason !== null) {
      this.logger.warn(`${staleReason}; replacing stale scheduler state`);
    }
  }

  /**
   * Write a heartbeat and check for a stop request from another process
   *
   * @returns false when the loop should exit
   */
  private async heartbeat(): Promise<boolean> {
    const now = this.clock.now().toISOString();
    let reason: string | null = null;

    await this.daemonStore.update((current) => {
      if (current.pid !== this.pid) {
        reason = "Scheduler state was taken over by another process";
        return current;
      }
      if (current.status === "stopping") {
        reason = "Stop requested";
        return current;
      }
      return { ...current, heartbeat_at: now };
    });

    if (reason !== null) {
      this.logger.info(`${reason}; shutting down`);
      this.state = "stopping";
      return false;
    }
    return true;
  }

  private async writeHeartbeat(): Promise<void> {
    const now = this.clock.now().toISOString();
    await this.daemonStore.update((current) =>
      current.pid === this.pid ? { ...current, heartbeat_at: now } : current
    );
  }

  private async releaseDaemonState(): Promise<boolean> {
    let owned = false;
    await this.daemonStore.update((current) => {
      if (current.pid !== this.pid) {
        return current;
      }
      owned = true;
      return createStoppedDaemonState();
    });
    return owned;
  }

  private async shutdown(): Promise<void> {
    try {
      const owned = (await this.daemonStore.read()).pid === this.pid;
      if (owned) {
        await updateScheduleConfig(this.scheduleStore, (current) => ({
          ...current,
          enabled: false,
          next_run: null,
        }));
      }
    } catch (error) {
      this.logger.error(`Failed to disable schedule on shutdown: ${errorMessage(error)}`);
    }

    await this.releaseDaemonState();
    this.state = "stopped";
    this.abortController = null;
    this.logger.info("Scheduler stopped");
  }
}
