/**
 * Time source for the scheduler
 *
 * The scheduler never reads the system clock or calls setTimeout directly, so
 * tests can drive it with a fake clock.
 */

export interface Clock {
  /** Current time */
  now(): Date;
  /**
   * Wait for `ms` milliseconds
   *
   * Resolves early, without rejecting, when `signal` aborts.
   */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Clock backed by Date and setTimeout
 */
export const systemClock: Clock = {
  now: () => new Date(),
  sleep: (ms: number, signal?: AbortSignal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }

      const onAbort = () => {
        clearTimeout(timeout);
        resolve();
      };
      const timeout = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);

      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};
