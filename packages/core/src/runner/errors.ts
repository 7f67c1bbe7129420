/**
 * Error classes for runner module
 *
 * Individual VM failures never surface as errors; they are reported in the
 * run summary. These errors abort a whole cycle.
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all runner errors
 */
export class RunnerError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "RunnerError";
    this.cause = options?.cause;
  }
}

// =============================================================================
// Cycle Errors
// =============================================================================

/**
 * Error thrown when the VM inventory for an "all VMs" run cannot be listed
 */
export class InventoryError extends RunnerError {
  /** Host whose inventory was requested */
  public readonly host: string;

  constructor(host: string, options?: { cause?: Error }) {
    const detail = options?.cause ? `: ${options.cause.message}` : "";
    super(`Failed to list VMs on ${host}${detail}`, options);
    this.name = "InventoryError";
    this.host = host;
  }
}

/**
 * Error thrown when another cycle holds the cycle lock for too long
 */
export class CycleLockError extends RunnerError {
  /** Path of the cycle lock file */
  public readonly lockPath: string;

  constructor(lockPath: string, options?: { cause?: Error }) {
    super(`Another run cycle is still in progress (lock ${lockPath})`, options);
    this.name = "CycleLockError";
    this.lockPath = lockPath;
  }
}
