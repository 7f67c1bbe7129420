/**
 * Processing cache (processed-vms.json)
 *
 * Records every VM whose ping monitoring was enabled successfully, keyed by
 * VM name. Run cycles consult it to skip VMs that were already handled unless
 * the cache is ignored. Records are only removed by an explicit clear.
 */

import { join } from "node:path";
import { JsonStore } from "./store.js";
import {
  ProcessingCacheSchema,
  parseProcessingCache,
  type ProcessingAction,
  type ProcessingCache,
  type ProcessingRecord,
} from "./schemas/processing-record.js";
import type { CachePolicy } from "./schemas/schedule-config.js";
import type { FileLockOptions } from "./utils/lock.js";
import { createDefaultLogger, type Logger } from "../utils/logger.js";

export const PROCESSING_CACHE_FILE = "processed-vms.json";

export interface StateCacheOptions {
  logger?: Logger;
  lock?: FileLockOptions;
}

/**
 * A cached record together with its VM name
 */
export interface ProcessingEntry extends ProcessingRecord {
  vm: string;
}

export class StateCache {
  private readonly store: JsonStore<Record<string, unknown>>;
  private readonly logger: Logger;

  constructor(stateDir: string, options: StateCacheOptions = {}) {
    this.logger = options.logger ?? createDefaultLogger("state");
    this.store = new JsonStore<Record<string, unknown>>({
      path: join(stateDir, PROCESSING_CACHE_FILE),
      schema: ProcessingCacheSchema,
      defaultValue: () => ({}),
      logger: this.logger,
      lock: options.lock,
    });
  }

  get path(): string {
    return this.store.path;
  }

  /**
   * Keep the valid entries of a raw cache file, warning about each dropped one
   */
  private toRecords(raw: Record<string, unknown>): ProcessingCache {
    const { records, invalid } = parseProcessingCache(raw);
    for (const entry of invalid) {
      this.logger.warn(
        `Ignoring invalid cache entry "${entry.vm}" in ${this.store.path}: ${entry.problem}`
      );
    }
    return records;
  }

  private async load(): Promise<ProcessingCache> {
    return this.toRecords(await this.store.read());
  }

  /**
   * Decide whether a VM needs processing under a cache policy
   *
   * Always true when the cache is ignored; otherwise true only for VMs
   * without a record.
   */
  async shouldProcess(vm: string, policy: CachePolicy): Promise<boolean> {
    if (policy === "ignore_cache") {
      return true;
    }
    const cache = await this.load();
    return !Object.hasOwn(cache, vm);
  }

  /**
   * Record a successful enablement
   *
   * Creates the record on first success; afterwards updates
   * `last_processed_at`, `source_host` and the count, keeping
   * `first_processed_at`.
   */
  async recordSuccess(
    vm: string,
    sourceHost: string,
    now: Date,
    action?: ProcessingAction
  ): Promise<ProcessingRecord> {
    const timestamp = now.toISOString();
    const updated = await this.store.update((raw) => {
      const current = this.toRecords(raw);
      const existing = Object.hasOwn(current, vm) ? current[vm] : undefined;
      const record: ProcessingRecord = existing
        ? {
            ...existing,
            last_processed_at: timestamp,
            source_host: sourceHost,
            times_processed: existing.times_processed + 1,
          }
        : {
            first_processed_at: timestamp,
            last_processed_at: timestamp,
            source_host: sourceHost,
            times_processed: 1,
          };
      if (action !== undefined) {
        record.last_action = action;
      }
      return { ...current, [vm]: record };
    });
    return parseProcessingCache(updated).records[vm];
  }

  async getRecord(vm: string): Promise<ProcessingRecord | null> {
    const cache = await this.load();
    return Object.hasOwn(cache, vm) ? cache[vm] : null;
  }

  /**
   * List all records, sorted by VM name
   */
  async listRecords(): Promise<ProcessingEntry[]> {
    const cache = await this.load();
    return Object.keys(cache)
      .sort((a, b) => a.localeCompare(b))
      .map((vm) => ({ vm, ...cache[vm] }));
  }

  /**
   * Remove one VM's record, or every record when no VM is given
   *
   * @returns Number of records removed
   */
  async clear(vm?: string): Promise<number> {
    let removed = 0;
    await this.store.update((raw) => {
      const current = this.toRecords(raw);
      if (vm === undefined) {
        removed = Object.keys(current).length;
        return {};
      }
      if (!Object.hasOwn(current, vm)) {
        return current;
      }
      removed = 1;
      const rest = { ...current };
      delete rest[vm];
      return rest;
    });
    return removed;
  }
}
