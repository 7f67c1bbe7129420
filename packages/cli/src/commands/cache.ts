/**
 * pingctl cache list | clear - Inspect and reset the processing cache
 */

import { loadLocalSettings, StateCache, type ProcessingEntry } from "@pingctl/core";
import { CliUsageError } from "../errors.js";
import { inquirerPrompter, type Prompter } from "../prompts.js";
import { createCommandLogger, type GlobalOptions } from "../runtime.js";

async function openCache(options: GlobalOptions): Promise<StateCache> {
  const { stateDir, scheduler: settings } = await loadLocalSettings({
    stateDir: options.state,
    configPath: options.config,
  });
  return new StateCache(stateDir, {
    logger: createCommandLogger("cache", options),
    lock: { timeoutMs: settings.lock_timeout },
  });
}

/**
 * Render cache entries as an aligned table
 */
export function formatCacheTable(entries: ProcessingEntry[]): string[] {
  const header = ["VM", "Last processed", "Times", "Action", "Source"];
  const rows = entries.map((entry) => [
    entry.vm,
    entry.last_processed_at,
    String(entry.times_processed),
    entry.last_action ?? "-",
    entry.source_host,
  ]);

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => row[column].length))
  );
  return [header, ...rows].map((row) =>
    row
      .map((cell, column) => cell.padEnd(widths[column]))
      .join("  ")
      .trimEnd()
  );
}

// =============================================================================
// list
// =============================================================================

export interface CacheListOptions extends GlobalOptions {
  json?: boolean;
}

export async function cacheListCommand(options: CacheListOptions): Promise<ProcessingEntry[]> {
  const cache = await openCache(options);
  const entries = await cache.listRecords();

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return entries;
  }

  if (entries.length === 0) {
    console.log("The processing cache is empty");
    return entries;
  }

  for (const line of formatCacheTable(entries)) {
    console.log(line);
  }
  console.log(`\n${entries.length} VM(s) in the processing cache`);
  return entries;
}

// =============================================================================
// clear
// =============================================================================

export interface CacheClearOptions extends GlobalOptions {
  yes?: boolean;
}

export interface CacheClearDependencies {
  prompter?: Pick<Prompter, "confirm">;
  /** Whether prompting is possible. Default: stdin and stdout are TTYs */
  interactive?: boolean;
}

/**
 * @returns Number of records removed
 */
export async function cacheClearCommand(
  vm: string | undefined,
  options: CacheClearOptions,
  deps: CacheClearDependencies = {}
): Promise<number> {
  const cache = await openCache(options);

  if (vm !== undefined) {
    const removed = await cache.clear(vm);
    console.log(removed > 0 ? `Removed cache entry for "${vm}"` : `No cache entry for "${vm}"`);
    return removed;
  }

  if (!options.yes) {
    const interactive =
      deps.interactive ?? (process.stdin.isTTY === true && process.stdout.isTTY === true);
    if (!interactive) {
      throw new CliUsageError("Refusing to clear the whole processing cache without --yes");
    }
    const confirmed = await (deps.prompter ?? inquirerPrompter).confirm({
      message: "Clear every entry from the processing cache?",
      default: false,
    });
    if (!confirmed) {
      console.log("Cancelled");
      return 0;
    }
  }

  const removed = await cache.clear();
  console.log(`Removed ${removed} cache ${removed === 1 ? "entry" : "entries"}`);
  return removed;
}
