/**
 * Backoff helpers shared by the platform client and the token manager
 */

import type { RetryOptions } from "./types.js";

export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
};

/**
 * Fill in retry defaults
 */
export function resolveRetryOptions(options?: RetryOptions): Required<RetryOptions> {
  return { ...DEFAULT_RETRY_OPTIONS, ...options };
}

/**
 * Calculate delay with exponential backoff and jitter
 *
 * `attempt` is zero-based: the first retry waits about `baseDelayMs`.
 */
export function calculateBackoffDelay(
  attempt: number,
  options: Required<RetryOptions>,
  random: () => number = Math.random
): number {
  const exponentialDelay = options.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);
  const jitter = cappedDelay * options.jitterFactor * random();

  return Math.floor(cappedDelay + jitter);
}
