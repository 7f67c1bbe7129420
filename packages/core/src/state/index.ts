/**
 * State management module
 *
 * Persisted state lives in one state directory (default `.pingctl/`):
 * - schedule.json: the schedule configuration
 * - daemon.json: the scheduler daemon run state
 * - processed-vms.json: the processing cache
 *
 * All files are written atomically and guarded by advisory file locks.
 */

export * from "./errors.js";
export * from "./schemas/index.js";
export * from "./utils/index.js";

export {
  JsonStore,
  type JsonStoreOptions,
  type StoreReadResult,
  type StoreReadStatus,
} from "./store.js";

export {
  StateCache,
  PROCESSING_CACHE_FILE,
  type StateCacheOptions,
  type ProcessingEntry,
} from "./state-cache.js";
