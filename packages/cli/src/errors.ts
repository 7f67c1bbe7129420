/**
 * CLI error types and exit-code mapping
 */

import {
  AlreadyRunningError,
  AuthError,
  ConfigError,
  ScheduleValidationError,
} from "@pingctl/core";

/**
 * Process exit codes
 */
export const ExitCode = {
  Success: 0,
  Failure: 1,
  Validation: 2,
  AlreadyRunning: 3,
  Auth: 4,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Invalid combination of command line options
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/**
 * A run cycle finished but some VMs failed
 */
export class RunFailuresError extends Error {
  public readonly failed: number;
  public readonly total: number;

  constructor(failed: number, total: number) {
    super(`${failed} of ${total} VM(s) failed`);
    this.name = "RunFailuresError";
    this.failed = failed;
    this.total = total;
  }
}

export function exitCodeFor(error: unknown): ExitCodeValue {
  if (
    error instanceof CliUsageError ||
    error instanceof ScheduleValidationError ||
    error instanceof ConfigError
  ) {
    return ExitCode.Validation;
  }
  if (error instanceof AlreadyRunningError) {
    return ExitCode.AlreadyRunning;
  }
  if (error instanceof AuthError) {
    return ExitCode.Auth;
  }
  return ExitCode.Failure;
}

/**
 * Whether the user cancelled an interactive prompt (Ctrl+C)
 */
export function isPromptAbort(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "ExitPromptError" || error.message.includes("User force closed"))
  );
}
