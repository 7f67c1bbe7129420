/**
 * Detached daemon startup
 *
 * `schedule start --daemon` re-executes pingctl in a detached child process
 * whose output goes to `<stateDir>/scheduler.log`, then waits until the child
 * records itself as running in daemon.json.
 */

import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import { mkdir, open } from "node:fs/promises";
import { join } from "node:path";
import { systemClock } from "./clock.js";
import { createDaemonStateStore, inspectDaemonState, isDaemonAlive } from "./daemon-state.js";
import { AlreadyRunningError, SchedulerError } from "./errors.js";
import type { SchedulerStateOptions } from "./types.js";

export const SCHEDULER_LOG_FILE = "scheduler.log";

export interface DetachedStartOptions extends SchedulerStateOptions {
  stateDir: string;
  /** Executable to run, usually process.execPath */
  command: string;
  /** Arguments that start the scheduler in the foreground */
  args: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** How long to wait for the child to report running. Default: 15000 */
  startupTimeoutMs?: number;
  /** Delay between startup checks. Default: 200 */
  pollIntervalMs?: number;
  heartbeatTimeoutMs?: number;
  /** Process spawner (testing) */
  spawnFn?: (command: string, args: string[], options: SpawnOptions) => ChildProcess;
}

export interface DetachedStartResult {
  pid: number;
  logPath: string;
}

/**
 * Start the scheduler in a detached background process
 *
 * @throws {AlreadyRunningError} If a live scheduler already owns the state directory
 * @throws {SchedulerError} If the child exits or does not report running in time
 */
export async function startDetached(options: DetachedStartOptions): Promise<DetachedStartResult> {
  const {
    stateDir,
    command,
    args,
    env = process.env,
    cwd = process.cwd(),
    startupTimeoutMs = 15_000,
    pollIntervalMs = 200,
    heartbeatTimeoutMs = 120_000,
    spawnFn = spawn,
  } = options;
  const clock = options.clock ?? systemClock;

  const { state } = await inspectDaemonState(stateDir, { ...options, heartbeatTimeoutMs });
  if (
    state.pid !== null &&
    isDaemonAlive(state, clock.now(), heartbeatTimeoutMs, options.isProcessAlive)
  ) {
    throw new AlreadyRunningError(state.pid);
  }

  await mkdir(stateDir, { recursive: true });
  const logPath = join(stateDir, SCHEDULER_LOG_FILE);
  const log = await open(logPath, "a");

  let child: ChildProcess;
  try {
    child = spawnFn(command, args, {
      cwd,
      env,
      detached: true,
      stdio: ["ignore", log.fd, log.fd],
    });
  } finally {
    await log.close();
  }

  const pid = child.pid;
  if (pid === undefined) {
    throw new SchedulerError(`Failed to start scheduler daemon. See ${logPath}`);
  }

  const exit: { exited: boolean; code: number | null } = { exited: false, code: null };
  child.once("exit", (code) => {
    exit.exited = true;
    exit.code = code;
  });
  child.unref();

  const store = createDaemonStateStore(stateDir, options);
  const deadline = clock.now().getTime() + startupTimeoutMs;
  for (;;) {
    const current = await store.read();
    if (current.pid === pid && current.status === "running") {
      return { pid, logPath };
    }
    if (exit.exited) {
      throw new SchedulerError(
        `Scheduler daemon exited during startup (exit code ${exit.code ?? "unknown"}). See ${logPath}`
      );
    }
    if (clock.now().getTime() >= deadline) {
      throw new SchedulerError(
        `Scheduler daemon (PID ${pid}) did not report running within ${startupTimeoutMs}ms. See ${logPath}`
      );
    }
    await clock.sleep(pollIntervalMs);
  }
}
