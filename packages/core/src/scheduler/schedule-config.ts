/**
 * Schedule configuration persistence (schedule.json)
 *
 * The schedule file is read leniently for display and strictly before a run:
 * a corrupt schedule never silently becomes the default schedule for the
 * daemon or a manual run.
 */

import { join } from "node:path";
import { JsonStore } from "../state/store.js";
import {
  ScheduleConfigSchema,
  createDefaultScheduleConfig,
  getCanonicalSchedule,
  getTargetSelector,
  type CachePolicy,
  type CanonicalSchedule,
  type ScheduleConfig,
  type TargetSelector,
} from "../state/schemas/schedule-config.js";
import { createDefaultLogger } from "../utils/logger.js";
import { systemClock } from "./clock.js";
import { ScheduleConfigError, ScheduleValidationError } from "./errors.js";
import { validateCanonicalSchedule } from "./friendly.js";
import { calculateNextRun, isSameSchedule } from "./next-run.js";
import { toLockOptions, type SchedulerStateOptions } from "./types.js";

export const SCHEDULE_CONFIG_FILE = "schedule.json";

/**
 * Changes applied by `schedule configure`
 */
export interface ScheduleUpdates {
  schedule?: CanonicalSchedule;
  target?: TargetSelector;
  cachePolicy?: CachePolicy;
}

/**
 * Get the path of schedule.json in a state directory
 */
export function getScheduleConfigPath(stateDir: string): string {
  return join(stateDir, SCHEDULE_CONFIG_FILE);
}

/**
 * Create the store backing schedule.json
 */
export function createScheduleStore(
  stateDir: string,
  options: SchedulerStateOptions = {}
): JsonStore<ScheduleConfig> {
  return new JsonStore<ScheduleConfig>({
    path: getScheduleConfigPath(stateDir),
    schema: ScheduleConfigSchema,
    defaultValue: createDefaultScheduleConfig,
    logger: options.logger ?? createDefaultLogger("scheduler"),
    lock: toLockOptions(options),
  });
}

/**
 * Load the schedule for a run
 *
 * A missing file yields the default schedule.
 *
 * @throws {ScheduleConfigError} If schedule.json is unparseable or invalid
 */
export async function loadScheduleConfig(
  stateDir: string,
  options: SchedulerStateOptions = {}
): Promise<ScheduleConfig> {
  return readScheduleStrict(createScheduleStore(stateDir, options));
}

async function readScheduleStrict(store: JsonStore<ScheduleConfig>): Promise<ScheduleConfig> {
  const result = await store.readDetailed();
  if (result.status === "corrupt") {
    throw new ScheduleConfigError(
      `Schedule configuration is unreadable: ${result.problem ?? store.path}. Fix or reconfigure it with 'pingctl schedule configure'.`,
      store.path
    );
  }
  return result.value;
}

/**
 * Read-modify-write schedule.json under its lock, refusing corrupt content
 *
 * @throws {ScheduleConfigError} If schedule.json is unparseable or invalid
 */
export async function updateScheduleConfig(
  store: JsonStore<ScheduleConfig>,
  fn: (current: ScheduleConfig) => ScheduleConfig
): Promise<ScheduleConfig> {
  return store.withLock(async () => {
    const next = fn(await readScheduleStrict(store));
    await store.write(next);
    return next;
  });
}

function toTargetFields(
  target: TargetSelector
): { target_vms: string[] } | { target_all_vms: true } {
  return target.kind === "all"
    ? { target_all_vms: true }
    : { target_vms: [...target.vmNames] };
}

function validateTarget(target: TargetSelector): void {
  if (target.kind === "all") {
    return;
  }
  if (target.vmNames.length === 0) {
    throw new ScheduleValidationError(
      "At least one VM name is required with --target-vms",
      "target_vms",
      ""
    );
  }
  const empty = target.vmNames.find((name) => name.trim() === "");
  if (empty !== undefined) {
    throw new ScheduleValidationError("VM names cannot be empty", "target_vms", empty);
  }
}

/**
 * Merge updates into a schedule configuration
 *
 * `next_run` is recomputed from `now` when the recurrence changes on an
 * enabled schedule.
 */
export function applyScheduleUpdates(
  current: ScheduleConfig,
  updates: ScheduleUpdates,
  now: Date
): ScheduleConfig {
  const currentSchedule = getCanonicalSchedule(current);
  const schedule = updates.schedule ?? currentSchedule;
  const recurrenceChanged = !isSameSchedule(schedule, currentSchedule);

  const next: ScheduleConfig = {
    ...schedule,
    ...toTargetFields(updates.target ?? getTargetSelector(current)),
    cache_policy: updates.cachePolicy ?? current.cache_policy,
    enabled: current.enabled,
    last_run: current.last_run,
    next_run:
      recurrenceChanged && current.enabled
        ? calculateNextRun(schedule, now).toISOString()
        : current.next_run,
    ...(current.last_error !== undefined ? { last_error: current.last_error } : {}),
  };

  return ScheduleConfigSchema.parse(next);
}

/**
 * Update the persisted schedule
 *
 * Updates are validated before anything is written; a validation failure
 * leaves schedule.json untouched.
 *
 * @throws {ScheduleValidationError} If the schedule or target is invalid
 */
export async function configureSchedule(
  stateDir: string,
  updates: ScheduleUpdates,
  options: SchedulerStateOptions = {}
): Promise<ScheduleConfig> {
  if (updates.schedule !== undefined) {
    validateCanonicalSchedule(updates.schedule);
  }
  if (updates.target !== undefined) {
    validateTarget(updates.target);
  }

  const clock = options.clock ?? systemClock;
  const store = createScheduleStore(stateDir, options);
  return store.update((current) => applyScheduleUpdates(current, updates, clock.now()));
}
