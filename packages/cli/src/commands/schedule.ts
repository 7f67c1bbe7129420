/**
 * pingctl schedule start | stop | status | run-now
 *
 * Lifecycle commands for the scheduler daemon. `start` runs the loop in the
 * foreground unless --daemon is given, in which case the same command is
 * re-executed as a detached child writing to <stateDir>/scheduler.log.
 */

import {
  errorMessage,
  getSchedulerStatus,
  loadConfig,
  loadLocalSettings,
  requestStop,
  startDetached,
  describeCachePolicy,
  Scheduler,
  type DetachedStartOptions,
  type DetachedStartResult,
  type RunSummary,
  type SchedulerStatusReport,
  type StopRequestOptions,
  type StopRequestResult,
} from "@pingctl/core";
import { RunFailuresError } from "../errors.js";
import { formatFields, formatRunResults } from "../format.js";
import {
  createCommandLogger,
  createJobRunner,
  type GlobalOptions,
  type JobRunnerFactory,
} from "../runtime.js";

type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Where shutdown signals come from. Default: process
 */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface ScheduleDependencies {
  createJobRunner?: JobRunnerFactory;
  startDetached?: (options: DetachedStartOptions) => Promise<DetachedStartResult>;
  requestStop?: (stateDir: string, options: StopRequestOptions) => Promise<StopRequestResult>;
  signals?: SignalSource;
}

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

// =============================================================================
// start
// =============================================================================

export interface ScheduleStartOptions extends GlobalOptions {
  daemon?: boolean;
}

/**
 * Arguments that re-run `schedule start` in the foreground for a detached child
 */
export function buildDaemonArgs(
  entryScript: string,
  configPath: string,
  stateDir: string,
  options: { verbose?: boolean; execArgv?: string[] } = {}
): string[] {
  return [
    ...(options.execArgv ?? []),
    entryScript,
    "--config",
    configPath,
    "--state",
    stateDir,
    ...(options.verbose ? ["--verbose"] : []),
    "schedule",
    "start",
  ];
}

export async function scheduleStartCommand(
  options: ScheduleStartOptions,
  deps: ScheduleDependencies = {}
): Promise<void> {
  const resolved = await loadConfig(options.config, { stateDir: options.state });
  const settings = resolved.config.scheduler;

  if (options.daemon) {
    const { pid, logPath } = await (deps.startDetached ?? startDetached)({
      stateDir: resolved.stateDir,
      command: process.execPath,
      args: buildDaemonArgs(process.argv[1], resolved.configPath, resolved.stateDir, {
        verbose: options.verbose,
        execArgv: process.execArgv,
      }),
      heartbeatTimeoutMs: settings.heartbeat_timeout,
      lockTimeoutMs: settings.lock_timeout,
    });
    console.log(`Scheduler started in the background (PID ${pid})`);
    console.log(`Logs: ${logPath}`);
    return;
  }

  const logSettings = { verbose: options.verbose, timestamps: true };
  const logger = createCommandLogger("scheduler", logSettings);
  const scheduler = new Scheduler({
    stateDir: resolved.stateDir,
    jobRunner: (deps.createJobRunner ?? createJobRunner)(resolved, logSettings),
    pollIntervalMs: settings.poll_interval,
    heartbeatTimeoutMs: settings.heartbeat_timeout,
    lockTimeoutMs: settings.lock_timeout,
    logger,
  });

  const signals: SignalSource = deps.signals ?? process;
  const onSignal: SignalListener = (signal) => {
    logger.info(`Received ${signal}, stopping after the current run cycle`);
    scheduler.stop().catch((error: unknown) => {
      logger.error(`Failed to stop scheduler: ${errorMessage(error)}`);
    });
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    signals.on(signal, onSignal);
  }
  try {
    await scheduler.start();
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      signals.off(signal, onSignal);
    }
  }

  console.log("Scheduler stopped");
}

// =============================================================================
// stop
// =============================================================================

export interface ScheduleStopOptions extends GlobalOptions {
  /** Seconds to wait for the daemon to exit. Default: 30 */
  timeout?: number;
}

export async function scheduleStopCommand(
  options: ScheduleStopOptions,
  deps: ScheduleDependencies = {}
): Promise<StopRequestResult> {
  const { stateDir, scheduler: settings } = await loadLocalSettings({
    stateDir: options.state,
    configPath: options.config,
  });
  const timeoutSeconds = options.timeout ?? 30;

  const result = await (deps.requestStop ?? requestStop)(stateDir, {
    timeoutMs: timeoutSeconds * 1000,
    heartbeatTimeoutMs: settings.heartbeat_timeout,
    lockTimeoutMs: settings.lock_timeout,
    logger: createCommandLogger("scheduler", options),
  });

  switch (result.status) {
    case "not_running":
      if (result.warning !== undefined) {
        console.log(`Warning: ${result.warning}`);
      }
      console.log("Scheduler is not running");
      break;
    case "stopped":
      console.log(`Scheduler stopped (PID ${result.pid})`);
      break;
    case "timeout":
      throw new Error(
        `Scheduler (PID ${result.pid}) did not stop within ${timeoutSeconds}s; it stops once the current run cycle finishes`
      );
  }
  return result;
}

// =============================================================================
// status
// =============================================================================

export interface ScheduleStatusOptions extends GlobalOptions {
  json?: boolean;
}

function describeDaemon(report: SchedulerStatusReport): string {
  return report.pid !== null && report.state !== "stopped"
    ? `${report.state} (PID ${report.pid})`
    : report.state;
}

/**
 * Render a status report for the terminal
 */
export function formatStatusReport(report: SchedulerStatusReport): string[] {
  const fields: [string, string][] = [["Scheduler", describeDaemon(report)]];
  if (report.state !== "stopped") {
    fields.push(["Started", report.startedAt ?? "-"], ["Heartbeat", report.heartbeatAt ?? "-"]);
  }
  fields.push(
    ["Schedule", `${report.schedule} (${report.enabled ? "enabled" : "disabled"})`],
    ["Target", report.target],
    ["Cache", describeCachePolicy({ cache_policy: report.cachePolicy })],
    ["Last run", report.lastRun ?? "never"],
    ["Next run", report.nextRun ?? "-"]
  );
  if (report.lastError !== null) {
    fields.push(["Last error", report.lastError]);
  }

  return [
    ...formatFields(fields),
    ...report.warnings.map((warning) => `Warning: ${warning}`),
  ];
}

export async function scheduleStatusCommand(
  options: ScheduleStatusOptions
): Promise<SchedulerStatusReport> {
  const { stateDir, scheduler: settings } = await loadLocalSettings({
    stateDir: options.state,
    configPath: options.config,
  });

  const report = await getSchedulerStatus(stateDir, {
    heartbeatTimeoutMs: settings.heartbeat_timeout,
    lockTimeoutMs: settings.lock_timeout,
    logger: createCommandLogger("scheduler", options),
  });

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatStatusReport(report)) {
      console.log(line);
    }
  }
  return report;
}

// =============================================================================
// run-now
// =============================================================================

export async function scheduleRunNowCommand(
  options: GlobalOptions,
  deps: ScheduleDependencies = {}
): Promise<RunSummary> {
  const resolved = await loadConfig(options.config, { stateDir: options.state });
  const settings = resolved.config.scheduler;

  const scheduler = new Scheduler({
    stateDir: resolved.stateDir,
    jobRunner: (deps.createJobRunner ?? createJobRunner)(resolved, options),
    heartbeatTimeoutMs: settings.heartbeat_timeout,
    lockTimeoutMs: settings.lock_timeout,
    logger: createCommandLogger("scheduler", options),
  });

  const summary = await scheduler.runNow();

  console.log(`\nRun-now on ${resolved.config.operations.host}:`);
  for (const line of formatRunResults(summary)) {
    console.log(line);
  }

  if (summary.failed > 0) {
    throw new RunFailuresError(summary.failed, summary.total);
  }
  return summary;
}
