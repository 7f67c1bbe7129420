/**
 * Scheduler status reporting
 */

import { createDefaultScheduleConfig } from "../state/schemas/schedule-config.js";
import { describeTarget, formatScheduleDescription } from "./describe.js";
import { inspectDaemonState } from "./daemon-state.js";
import { createScheduleStore } from "./schedule-config.js";
import type { SchedulerStateOptions, SchedulerStatusReport } from "./types.js";

/**
 * Report the scheduler state and schedule
 *
 * A daemon recorded as running whose process is gone or whose heartbeat is
 * stale is reported, and persisted, as stopped with a warning. A corrupt
 * schedule.json is reported as a warning and shown as the default schedule.
 */
export async function getSchedulerStatus(
  stateDir: string,
  options: SchedulerStateOptions & { heartbeatTimeoutMs?: number } = {}
): Promise<SchedulerStatusReport> {
  const warnings: string[] = [];

  const inspection = await inspectDaemonState(stateDir, options);
  if (inspection.warning !== undefined) {
    warnings.push(inspection.warning);
  }

  const scheduleRead = await createScheduleStore(stateDir, options).readDetailed();
  if (scheduleRead.status === "corrupt") {
    warnings.push(scheduleRead.problem ?? "Schedule configuration is unreadable");
  }
  const config =
    scheduleRead.status === "ok" ? scheduleRead.value : createDefaultScheduleConfig();

  const { state } = inspection;
  return {
    state: state.status,
    pid: state.pid,
    startedAt: state.started_at,
    heartbeatAt: state.heartbeat_at,
    enabled: config.enabled,
    schedule: formatScheduleDescription(config),
    target: describeTarget(config),
    cachePolicy: config.cache_policy,
    lastRun: config.last_run,
    nextRun: config.next_run,
    lastError: config.last_error ?? null,
    warnings,
  };
}
