/**
 * Wiring between the loaded configuration and the core services
 */

import {
  createLogger,
  resolveLogLevel,
  JobRunner,
  OperationsClient,
  TokenManager,
  type CycleRunner,
  type Logger,
  type ResolvedConfig,
} from "@pingctl/core";

/**
 * Options every command accepts through the program's global flags
 */
export interface GlobalOptions {
  config?: string;
  state?: string;
  verbose?: boolean;
}

export interface LoggerSettings {
  verbose?: boolean;
  timestamps?: boolean;
}

/**
 * Create a component logger honoring --verbose and PINGCTL_LOG_LEVEL
 */
export function createCommandLogger(component: string, settings: LoggerSettings = {}): Logger {
  return createLogger({
    prefix: `[${component}]`,
    level: settings.verbose ? "debug" : resolveLogLevel(),
    timestamps: settings.timestamps ?? false,
  });
}

/**
 * Builds the job runner for a loaded configuration
 */
export type JobRunnerFactory = (resolved: ResolvedConfig, settings: LoggerSettings) => CycleRunner;

/**
 * Build the platform client, token manager and job runner from configuration
 */
export const createJobRunner: JobRunnerFactory = (resolved, settings) => {
  const { config, stateDir } = resolved;
  const { operations, token } = config;

  const retry = {
    maxRetries: operations.retry.max_retries,
    baseDelayMs: operations.retry.base_delay_ms,
    maxDelayMs: operations.retry.max_delay_ms,
  };

  const client = new OperationsClient({
    host: operations.host,
    credentials: {
      username: operations.auth.username,
      password: operations.auth.password,
      authSource: operations.auth.auth_source,
    },
    requestTimeoutMs: operations.request_timeout,
    retry,
    defaultTokenTtlMs: token.default_ttl,
    logger: createCommandLogger("operations", settings),
  });

  const tokens = new TokenManager({
    provider: client,
    safetyMarginMs: token.safety_margin,
    retry,
    logger: createCommandLogger("token", settings),
  });

  return new JobRunner({
    stateDir,
    platform: client,
    tokens,
    concurrency: operations.concurrency,
    logger: createCommandLogger("job-runner", settings),
  });
};
