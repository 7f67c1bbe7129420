/**
 * Advisory file locks
 *
 * A lock on `<path>` is the exclusive creation of `<path>.lock` containing the
 * owner's PID. Waiters poll until the lock is released or their bounded wait
 * expires. A lock whose owner is dead, or that is older than the stale
 * threshold, is broken.
 */

import { mkdir, open, readFile, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { LockTimeoutError } from "../errors.js";
import { isProcessAlive, type ProcessAliveCheck } from "../../utils/process.js";
import { getErrorCode } from "../../utils/errno.js";

/**
 * Options for acquiring a file lock
 */
export interface FileLockOptions {
  /** Maximum time to wait for the lock, in milliseconds. Default: 10000 */
  timeoutMs?: number;
  /** Delay between acquisition attempts, in milliseconds. Default: 50 */
  pollIntervalMs?: number;
  /**
   * Age after which a held lock is considered abandoned, in milliseconds.
   * Default: 60000. Use Infinity for locks held across long operations.
   */
  staleMs?: number;
  /** Liveness check for the PID recorded in the lock (testing) */
  isProcessAlive?: ProcessAliveCheck;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_POLL_INTERVAL_MS = 50;
const DEFAULT_STALE_MS = 60_000;

/**
 * Get the lock file path guarding `filePath`
 */
export function getLockPath(filePath: string): string {
  return `${filePath}.lock`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function tryCreateLock(lockPath: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx");
    try {
      await handle.writeFile(`${process.pid}\n`, "utf-8");
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (getErrorCode(error) === "EEXIST") {
      return false;
    }
    throw error;
  }
}

async function readHolderPid(lockPath: string): Promise<number | null> {
  try {
    const pid = parseInt((await readFile(lockPath, "utf-8")).trim(), 10);
    return isNaN(pid) ? null : pid;
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function isLockStale(
  lockPath: string,
  staleMs: number,
  alive: ProcessAliveCheck
): Promise<boolean> {
  const holderPid = await readHolderPid(lockPath);
  if (holderPid !== null && !alive(holderPid)) {
    return true;
  }

  try {
    const { mtimeMs } = await stat(lockPath);
    return Date.now() - mtimeMs > staleMs;
  } catch (error) {
    if (getErrorCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}

async function removeLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (error) {
    if (getErrorCode(error) !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Acquire the lock guarding `filePath`
 *
 * @returns A function that releases the lock
 * @throws LockTimeoutError if the lock is not acquired within `timeoutMs`
 */
export async function acquireFileLock(
  filePath: string,
  options: FileLockOptions = {}
): Promise<() => Promise<void>> {
  const {
    timeoutMs = DEFAULT_TIMEOUT_MS,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    staleMs = DEFAULT_STALE_MS,
    isProcessAlive: alive = isProcessAlive,
  } = options;
  const lockPath = getLockPath(filePath);
  const deadline = Date.now() + timeoutMs;

  await mkdir(dirname(lockPath), { recursive: true });

  for (;;) {
    if (await tryCreateLock(lockPath)) {
      let released = false;
      return async () => {
        if (!released) {
          released = true;
          await removeLock(lockPath);
        }
      };
    }

    if (await isLockStale(lockPath, staleMs, alive)) {
      await removeLock(lockPath);
      continue;
    }

    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, timeoutMs, await readHolderPid(lockPath));
    }

    await sleep(pollIntervalMs);
  }
}

/**
 * Run `fn` while holding the lock guarding `filePath`
 */
export async function withFileLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const release = await acquireFileLock(filePath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
