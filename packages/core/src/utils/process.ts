/**
 * Process liveness helpers
 */

import { getErrorCode } from "./errno.js";

/**
 * Check if a process is running
 *
 * Sending signal 0 checks whether the process exists without signaling it.
 * EPERM means the process exists but belongs to another user.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return getErrorCode(error) === "EPERM";
  }
}

/**
 * Function type used to inject liveness checks in tests
 */
export type ProcessAliveCheck = (pid: number) => boolean;
