/**
 * Job runner - executes one run cycle over a target selection
 *
 * A cycle resolves its targets (the platform inventory for "all VMs", the
 * given names verbatim otherwise), then for each target in order consults the
 * processing cache, enables ping monitoring and records the success.
 *
 * Failures of individual VMs are collected in the summary and never stop the
 * cycle. Two things abort it: an inventory that cannot be listed, and an
 * {@link AuthError} (no token, or the platform rejects a freshly issued one).
 *
 * Cycles are serialized across processes by `<stateDir>/cycle.lock`, so a
 * manual run waits for a scheduled cycle in progress and vice versa.
 */

import { join } from "node:path";
import { systemClock, type Clock } from "../scheduler/clock.js";
import { AuthError, UnauthorizedError } from "../operations/errors.js";
import type { VirtualMachine } from "../operations/types.js";
import { StateCache } from "../state/state-cache.js";
import { LockTimeoutError } from "../state/errors.js";
import { acquireFileLock, type FileLockOptions } from "../state/utils/lock.js";
import type {
  CachePolicy,
  TargetSelector,
} from "../state/schemas/schedule-config.js";
import { createDefaultLogger, errorMessage, type Logger } from "../utils/logger.js";
import { CycleLockError, InventoryError } from "./errors.js";
import type {
  CycleRunner,
  MonitoringPlatform,
  RunSummary,
  TokenSource,
  VmResult,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface JobRunnerOptions {
  /** State directory holding the processing cache and the cycle lock */
  stateDir: string;
  platform: MonitoringPlatform;
  tokens: TokenSource;
  /** Processing cache. Default: a StateCache in `stateDir` */
  cache?: StateCache;
  clock?: Clock;
  logger?: Logger;
  /** Number of VMs processed in parallel. Default: 1 */
  concurrency?: number;
  /** Options for the cycle lock. Default: wait up to 1 hour, never stale by age */
  cycleLock?: FileLockOptions;
}

export const CYCLE_LOCK_NAME = "cycle";

const DEFAULT_CYCLE_LOCK: FileLockOptions = {
  timeoutMs: 60 * 60 * 1000,
  pollIntervalMs: 1000,
  staleMs: Infinity,
};

type Target = VirtualMachine | string;

function targetName(target: Target): string {
  return typeof target === "string" ? target : target.name;
}

/**
 * Render a summary as a single log line
 */
export function formatRunSummary(summary: RunSummary): string {
  return (
    `${summary.total} target(s): ${summary.succeeded} succeeded, ` +
    `${summary.failed} failed, ${summary.skipped} skipped`
  );
}

// =============================================================================
// JobRunner
// =============================================================================

export class JobRunner implements CycleRunner {
  private readonly stateDir: string;
  private readonly platform: MonitoringPlatform;
  private readonly tokens: TokenSource;
  private readonly cache: StateCache;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly cycleLock: FileLockOptions;

  /** Tail of the chain serializing cache writes within this process */
  private cacheWrites: Promise<unknown> = Promise.resolve();

  constructor(options: JobRunnerOptions) {
    this.stateDir = options.stateDir;
    this.platform = options.platform;
    this.tokens = options.tokens;
    this.logger = options.logger ?? createDefaultLogger("job-runner");
    this.cache = options.cache ?? new StateCache(options.stateDir, { logger: this.logger });
    this.clock = options.clock ?? systemClock;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    this.cycleLock = { ...DEFAULT_CYCLE_LOCK, ...options.cycleLock };
  }

  get cycleLockPath(): string {
    return join(this.stateDir, `${CYCLE_LOCK_NAME}.lock`);
  }

  /**
   * Run one cycle
   *
   * @throws {AuthError} When authentication fails for good
   * @throws {InventoryError} When "all VMs" cannot be resolved
   * @throws {CycleLockError} When another cycle holds the lock past the wait limit
   */
  async run(target: TargetSelector, policy: CachePolicy): Promise<RunSummary> {
    const release = await this.acquireCycleLock();
    try {
      return await this.execute(target, policy);
    } finally {
      await release();
    }
  }

  private async acquireCycleLock(): Promise<() => Promise<void>> {
    try {
      return await acquireFileLock(join(this.stateDir, CYCLE_LOCK_NAME), this.cycleLock);
    } catch (error) {
      if (error instanceof LockTimeoutError) {
        throw new CycleLockError(error.lockPath, { cause: error });
      }
      throw error;
    }
  }

  private async execute(target: TargetSelector, policy: CachePolicy): Promise<RunSummary> {
    const startedAt = this.clock.now();
    const targets = await this.resolveTargets(target);

    this.logger.info(
      `Processing ${targets.length} VM(s) on ${this.platform.host} (${policy === "use_cache" ? "using" : "ignoring"} cache)`
    );

    const results: VmResult[] = new Array<VmResult>(targets.length);
    const progress: { next: number; fatal: AuthError | null } = { next: 0, fatal: null };

    const worker = async (): Promise<void> => {
      while (progress.fatal === null && progress.next < targets.length) {
        const index = progress.next++;
        try {
          results[index] = await this.processTarget(targets[index], policy);
        } catch (error) {
          if (!(error instanceof AuthError)) {
            throw error;
          }
          progress.fatal ??= error;
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, targets.length) }, () =>
      worker()
    );
    await Promise.all(workers);

    if (progress.fatal !== null) {
      const done = results.filter((result) => result !== undefined).length;
      this.logger.error(
        `Run aborted after ${done} of ${targets.length} VM(s): ${progress.fatal.message}`
      );
      throw progress.fatal;
    }

    const summary = this.summarize(results, startedAt);
    this.logger.info(`Run finished: ${formatRunSummary(summary)}`);
    return summary;
  }

  private async resolveTargets(target: TargetSelector): Promise<Target[]> {
    if (target.kind === "explicit") {
      return [...target.vmNames];
    }

    try {
      return await this.withAuthRetry((token) => this.platform.listVirtualMachines(token));
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      throw new InventoryError(this.platform.host, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private async processTarget(target: Target, policy: CachePolicy): Promise<VmResult> {
    const vm = targetName(target);

    if (!(await this.cache.shouldProcess(vm, policy))) {
      this.logger.info(`Skipping ${vm}: already processed`);
      return { vm, outcome: "skipped" };
    }

    try {
      const outcome = await this.withAuthRetry((token) =>
        this.platform.enablePingMonitoring(target, token)
      );
      await this.serializeCacheWrite(() =>
        this.cache.recordSuccess(vm, this.platform.host, this.clock.now(), outcome)
      );
      this.logger.debug(`${vm}: ${outcome}`);
      return { vm, outcome };
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      const message = errorMessage(error);
      this.logger.error(`Failed to enable ping monitoring for ${vm}: ${message}`);
      return { vm, outcome: "failed", error: message };
    }
  }

  /**
   * Call the platform with a token; on a 401, invalidate and retry once
   */
  private async withAuthRetry<T>(call: (token: string) => Promise<T>): Promise<T> {
    const token = await this.tokens.getToken();
    try {
      return await call(token);
    } catch (error) {
      if (!(error instanceof UnauthorizedError)) {
        throw error;
      }
    }

    this.logger.warn("Token rejected by the platform; refreshing and retrying");
    this.tokens.invalidate();
    const fresh = await this.tokens.getToken();
    try {
      return await call(fresh);
    } catch (error) {
      if (error instanceof UnauthorizedError) {
        throw new AuthError("Platform rejected a freshly acquired token", { cause: error });
      }
      throw error;
    }
  }

  private serializeCacheWrite<T>(write: () => Promise<T>): Promise<T> {
    const result = this.cacheWrites.then(write);
    this.cacheWrites = result.catch(() => undefined);
    return result;
  }

  private summarize(results: VmResult[], startedAt: Date): RunSummary {
    const count = (outcome: VmResult["outcome"]) =>
      results.filter((result) => result.outcome === outcome).length;

    const failures = results
      .filter((result) => result.outcome === "failed")
      .map((result) => ({ vm: result.vm, error: result.error ?? "Unknown error" }));

    const skipped = count("skipped");
    const failed = failures.length;
    const succeeded = results.length - skipped - failed;

    return {
      total: results.length,
      attempted: succeeded + failed,
      skipped,
      succeeded,
      failed,
      failures,
      results,
      startedAt: startedAt.toISOString(),
      finishedAt: this.clock.now().toISOString(),
    };
  }
}
