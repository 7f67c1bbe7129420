/**
 * In-memory token cache with single-flight refresh
 *
 * Hands out the cached token while it is valid for longer than the safety
 * margin. Otherwise one refresh runs against the token provider and every
 * concurrent caller awaits that same refresh.
 */

import { systemClock, type Clock } from "../scheduler/clock.js";
import type { TokenSource } from "../runner/types.js";
import { createDefaultLogger, errorMessage, type Logger } from "../utils/logger.js";
import { AuthError, NetworkError } from "./errors.js";
import { calculateBackoffDelay, resolveRetryOptions } from "./retry.js";
import type { AcquiredToken, RetryOptions, TokenProvider } from "./types.js";

export interface TokenManagerOptions {
  provider: TokenProvider;
  /** Refresh this long before expiry, in ms. Default: 60000 */
  safetyMarginMs?: number;
  retry?: RetryOptions;
  clock?: Clock;
  logger?: Logger;
  random?: () => number;
}

const DEFAULT_SAFETY_MARGIN_MS = 60_000;

export class TokenManager implements TokenSource {
  private readonly provider: TokenProvider;
  private readonly safetyMarginMs: number;
  private readonly retryOptions: Required<RetryOptions>;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly random: () => number;

  private current: AcquiredToken | null = null;
  private refreshInProgress: Promise<AcquiredToken> | null = null;

  constructor(options: TokenManagerOptions) {
    this.provider = options.provider;
    this.safetyMarginMs = options.safetyMarginMs ?? DEFAULT_SAFETY_MARGIN_MS;
    this.retryOptions = resolveRetryOptions(options.retry);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createDefaultLogger("token");
    this.random = options.random ?? Math.random;
  }

  /**
   * Return a usable token, refreshing it when needed
   *
   * @throws {AuthError} When no token could be acquired
   */
  async getToken(): Promise<string> {
    if (this.current !== null && this.isFresh(this.current)) {
      return this.current.token;
    }

    if (this.refreshInProgress === null) {
      this.refreshInProgress = this.refresh().finally(() => {
        this.refreshInProgress = null;
      });
    }

    const acquired = await this.refreshInProgress;
    return acquired.token;
  }

  /**
   * Drop the cached token so the next getToken() refreshes
   */
  invalidate(): void {
    if (this.current !== null) {
      this.logger.debug("Token invalidated");
    }
    this.current = null;
  }

  /**
   * Expiry of the cached token, or null when none is held
   */
  getExpiry(): Date | null {
    return this.current?.expiresAt ?? null;
  }

  private isFresh(token: AcquiredToken): boolean {
    return this.clock.now().getTime() < token.expiresAt.getTime() - this.safetyMarginMs;
  }

  private async refresh(): Promise<AcquiredToken> {
    for (let attempt = 0; ; attempt++) {
      try {
        const acquired = await this.provider.acquireToken();
        if (!this.isFresh(acquired)) {
          this.logger.warn(
            `Acquired token expires at ${acquired.expiresAt.toISOString()}, inside the refresh margin`
          );
        }
        this.current = acquired;
        this.logger.debug(`Token refreshed; expires at ${acquired.expiresAt.toISOString()}`);
        return acquired;
      } catch (error) {
        if (
          error instanceof NetworkError &&
          error.isRetryable() &&
          attempt < this.retryOptions.maxRetries
        ) {
          const delay = calculateBackoffDelay(attempt, this.retryOptions, this.random);
          this.logger.warn(
            `Token refresh failed: ${error.message}; retrying in ${delay}ms`
          );
          await this.clock.sleep(delay);
          continue;
        }

        throw new AuthError(`Failed to acquire token: ${errorMessage(error)}`, {
          cause: error instanceof Error ? error : undefined,
        });
      }
    }
  }
}
