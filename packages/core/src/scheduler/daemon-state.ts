/**
 * Scheduler daemon run state (daemon.json)
 *
 * The persisted state is evidence, not authority: a daemon is only considered
 * alive when its recorded PID is running and its heartbeat is fresh. Stale
 * state is corrected to `stopped` when it is detected.
 */

import { join } from "node:path";
import { JsonStore } from "../state/store.js";
import {
  DaemonRunStateSchema,
  createStoppedDaemonState,
  type DaemonRunState,
} from "../state/schemas/daemon-state.js";
import { createDefaultLogger } from "../utils/logger.js";
import { isProcessAlive, type ProcessAliveCheck } from "../utils/process.js";
import { systemClock } from "./clock.js";
import {
  toLockOptions,
  type SchedulerStateOptions,
  type StopRequestOptions,
  type StopRequestResult,
} from "./types.js";
import { getErrorCode } from "../utils/errno.js";

export const DAEMON_STATE_FILE = "daemon.json";

const DEFAULT_HEARTBEAT_TIMEOUT_MS = 120_000;
const DEFAULT_STOP_TIMEOUT_MS = 30_000;
const DEFAULT_STOP_POLL_INTERVAL_MS = 250;

/**
 * Get the path of daemon.json in a state directory
 */
export function getDaemonStatePath(stateDir: string): string {
  return join(stateDir, DAEMON_STATE_FILE);
}

/**
 * Create the store backing daemon.json
 */
export function createDaemonStateStore(
  stateDir: string,
  options: SchedulerStateOptions = {}
): JsonStore<DaemonRunState> {
  return new JsonStore<DaemonRunState>({
    path: getDaemonStatePath(stateDir),
    schema: DaemonRunStateSchema,
    defaultValue: createStoppedDaemonState,
    logger: options.logger ?? createDefaultLogger("scheduler"),
    lock: toLockOptions(options),
  });
}

/**
 * Why a recorded daemon is not considered alive, or null when it is
 */
export function getStaleReason(
  state: DaemonRunState,
  now: Date,
  heartbeatTimeoutMs: number,
  alive: ProcessAliveCheck = isProcessAlive
): string | null {
  if (state.status === "stopped") {
    return null;
  }
  if (state.pid === null) {
    return `Scheduler state is "${state.status}" but no process is recorded`;
  }
  if (!alive(state.pid)) {
    return `Scheduler process (PID ${state.pid}) is not running`;
  }

  const lastSeen = state.heartbeat_at ?? state.started_at;
  if (lastSeen !== null) {
    const age = now.getTime() - new Date(lastSeen).getTime();
    if (age > heartbeatTimeoutMs) {
      return `Scheduler heartbeat is stale (last at ${lastSeen})`;
    }
  }
  return null;
}

/**
 * Check whether a recorded daemon is alive
 */
export function isDaemonAlive(
  state: DaemonRunState,
  now: Date,
  heartbeatTimeoutMs: number,
  alive: ProcessAliveCheck = isProcessAlive
): boolean {
  return state.status !== "stopped" && getStaleReason(state, now, heartbeatTimeoutMs, alive) === null;
}

export interface DaemonInspection {
  /** The state after any correction */
  state: DaemonRunState;
  /** Set when a stale state was corrected to stopped */
  warning?: string;
}

/**
 * Read the daemon state, correcting a stale one to stopped
 */
export async function inspectDaemonState(
  stateDir: string,
  options: SchedulerStateOptions & { heartbeatTimeoutMs?: number } = {}
): Promise<DaemonInspection> {
  const clock = options.clock ?? systemClock;
  const heartbeatTimeoutMs = options.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const store = createDaemonStateStore(stateDir, options);

  const current = await store.read();
  if (getStaleReason(current, clock.now(), heartbeatTimeoutMs, alive) === null) {
    return { state: current };
  }

  // Re-check under the lock; the daemon may have written since the first read
  let warning: string | undefined;
  const corrected = await store.update((latest) => {
    const reason = getStaleReason(latest, clock.now(), heartbeatTimeoutMs, alive);
    if (reason === null) {
      return latest;
    }
    warning = `${reason}; marked as stopped`;
    return createStoppedDaemonState();
  });

  if (warning !== undefined) {
    (options.logger ?? createDefaultLogger("scheduler")).warn(warning);
  }
  return warning === undefined ? { state: corrected } : { state: corrected, warning };
}

/**
 * Ask a running daemon to stop
 *
 * Marks the state `stopping`, sends SIGTERM to the recorded PID and waits for
 * the daemon to record `stopped` or exit. A daemon in the middle of a run
 * cycle finishes the cycle first. The process is never killed.
 */
export async function requestStop(
  stateDir: string,
  options: StopRequestOptions = {}
): Promise<StopRequestResult> {
  const clock = options.clock ?? systemClock;
  const alive = options.isProcessAlive ?? isProcessAlive;
  const timeoutMs = options.timeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_STOP_POLL_INTERVAL_MS;
  const sendSignal =
    options.sendSignal ??
    ((pid: number, signal: NodeJS.Signals) => {
      process.kill(pid, signal);
    });

  const inspection = await inspectDaemonState(stateDir, options);
  if (inspection.state.status === "stopped" || inspection.state.pid === null) {
    return inspection.warning !== undefined
      ? { status: "not_running", warning: inspection.warning }
      : { status: "not_running" };
  }

  const pid = inspection.state.pid;
  const store = createDaemonStateStore(stateDir, options);
  await store.update((latest) =>
    latest.pid === pid && latest.status !== "stopped"
      ? { ...latest, status: "stopping" }
      : latest
  );

  try {
    sendSignal(pid, "SIGTERM");
  } catch (error) {
    if (getErrorCode(error) !== "ESRCH") {
      throw error;
    }
  }

  const deadline = clock.now().getTime() + timeoutMs;
  for (;;) {
    const state = await store.read();
    if (state.status === "stopped" || state.pid !== pid || !alive(pid)) {
      if (state.status !== "stopped" && state.pid === pid) {
        // Exited without recording its shutdown
        await store.update((latest) =>
          latest.pid === pid ? createStoppedDaemonState() : latest
        );
      }
      return { status: "stopped", pid };
    }
    if (clock.now().getTime() >= deadline) {
      return { status: "timeout", pid };
    }
    await clock.sleep(pollIntervalMs);
  }
}
