/**
 * Error classes for state management
 */

/**
 * Base error class for all state errors
 */
export class StateError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "StateError";
    this.cause = options?.cause;
  }
}

/**
 * Error thrown when a state file cannot be written or removed
 */
export class StateFileError extends StateError {
  /** Path of the state file */
  public readonly path: string;

  /** The operation that failed */
  public readonly operation: "read" | "write" | "delete";

  constructor(
    message: string,
    path: string,
    operation: "read" | "write" | "delete",
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.name = "StateFileError";
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Error thrown when an advisory file lock is not acquired within its bounded wait
 */
export class LockTimeoutError extends StateError {
  /** Path of the lock file */
  public readonly lockPath: string;

  /** How long the caller waited, in milliseconds */
  public readonly timeoutMs: number;

  /** PID recorded in the lock file, if readable */
  public readonly holderPid: number | null;

  constructor(lockPath: string, timeoutMs: number, holderPid: number | null) {
    const holder = holderPid !== null ? ` (held by PID ${holderPid})` : "";
    super(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}${holder}`);
    this.name = "LockTimeoutError";
    this.lockPath = lockPath;
    this.timeoutMs = timeoutMs;
    this.holderPid = holderPid;
  }
}
