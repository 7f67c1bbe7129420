/**
 * Error classes for scheduler module
 *
 * Provides typed errors with descriptive messages for schedule parsing,
 * schedule configuration and daemon lifecycle operations.
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all scheduler errors
 */
export class SchedulerError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "SchedulerError";
    this.cause = options?.cause;
  }
}

// =============================================================================
// Parse and Validation Errors
// =============================================================================

/**
 * Error thrown when a duration string (e.g. "30s", "5m") cannot be parsed
 */
export class IntervalParseError extends SchedulerError {
  /** The original input string that failed to parse */
  public readonly input: string;

  constructor(message: string, input: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "IntervalParseError";
    this.input = input;
  }
}

/**
 * Error thrown when a friendly or canonical schedule is invalid
 *
 * Nothing is persisted when this error is raised.
 */
export class ScheduleValidationError extends SchedulerError {
  /** The offending input value, as given by the user */
  public readonly input: string;

  /** The schedule option or field the input belongs to */
  public readonly field: string;

  constructor(
    message: string,
    field: string,
    input: string,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.name = "ScheduleValidationError";
    this.field = field;
    this.input = input;
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

/**
 * Error thrown when a start is requested while a live daemon already exists
 */
export class AlreadyRunningError extends SchedulerError {
  /** PID of the running scheduler process */
  public readonly pid: number;

  constructor(pid: number, options?: { cause?: Error }) {
    super(
      `Scheduler is already running (PID ${pid}). Stop it first with 'pingctl schedule stop'.`,
      options
    );
    this.name = "AlreadyRunningError";
    this.pid = pid;
  }
}

/**
 * Error thrown when the persisted schedule configuration cannot be used
 *
 * Raised at startup or before a manual run when schedule.json exists but is
 * unparseable or fails validation. Unlike the processing cache, a broken
 * schedule is never replaced silently.
 */
export class ScheduleConfigError extends SchedulerError {
  /** Path to the schedule configuration file */
  public readonly path: string;

  constructor(message: string, path: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "ScheduleConfigError";
    this.path = path;
  }
}
