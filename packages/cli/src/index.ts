#!/usr/bin/env node

/**
 * pingctl - Scheduled ping-monitoring enablement for VMs
 *
 * Commands:
 * - pingctl enable                  Enable ping monitoring now (flags or prompts)
 * - pingctl schedule start          Run the scheduler (foreground or --daemon)
 * - pingctl schedule stop           Ask a running scheduler to stop
 * - pingctl schedule status         Show scheduler state and schedule
 * - pingctl schedule run-now        Run one cycle of the configured schedule
 * - pingctl schedule configure      Change schedule, targets and cache policy
 * - pingctl cache list              Show VMs already processed
 * - pingctl cache clear [vm]        Forget processed VMs
 */

import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "module";
import { errorMessage } from "@pingctl/core";
import { enableCommand, type EnableOptions } from "./commands/enable.js";
import {
  scheduleRunNowCommand,
  scheduleStartCommand,
  scheduleStatusCommand,
  scheduleStopCommand,
  type ScheduleStartOptions,
  type ScheduleStatusOptions,
  type ScheduleStopOptions,
} from "./commands/schedule.js";
import {
  scheduleConfigureCommand,
  type ScheduleConfigureOptions,
} from "./commands/configure.js";
import {
  cacheClearCommand,
  cacheListCommand,
  type CacheClearOptions,
  type CacheListOptions,
} from "./commands/cache.js";
import { ExitCode, exitCodeFor, isPromptAbort } from "./errors.js";
import type { GlobalOptions } from "./runtime.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a whole number of at least 1.");
  }
  return parsed;
}

/**
 * Run a command action, mapping failures to exit codes
 */
async function run(action: () => Promise<unknown>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (isPromptAbort(error)) {
      console.log("\nAborted.");
      process.exit(ExitCode.Success);
    }
    console.error("Error:", errorMessage(error));
    process.exit(exitCodeFor(error));
  }
}

const program = new Command();

program
  .name("pingctl")
  .description("Enable ping monitoring for VMs on the operations platform, once or on a schedule")
  .version(pkg.version)
  .option("-c, --config <path>", "Path to pingctl.yaml or a directory to search from")
  .option("-s, --state <dir>", "Path to state directory (default: .pingctl)")
  .option("-v, --verbose", "Log debug output");

program
  .command("enable")
  .description("Enable ping monitoring now for the given VMs")
  .option("--vm-name <names...>", "One or more VM names")
  .option("--all-vms", "Every VM in the platform inventory")
  .option("-f, --force", "Ignore the processing cache and process every target")
  .action(async (_options: unknown, command: Command) => {
    await run(() => enableCommand(command.optsWithGlobals<EnableOptions>()));
  });

// Schedule command group
const scheduleCmd = program
  .command("schedule")
  .description("Recurring enablement: scheduler lifecycle and configuration");

scheduleCmd
  .command("start")
  .description("Start the scheduler")
  .option("-d, --daemon", "Run in the background, logging to <state>/scheduler.log")
  .action(async (_options: unknown, command: Command) => {
    await run(() => scheduleStartCommand(command.optsWithGlobals<ScheduleStartOptions>()));
  });

scheduleCmd
  .command("stop")
  .description("Stop a running scheduler after its current run cycle")
  .option("-t, --timeout <seconds>", "Seconds to wait for the scheduler to exit", parsePositiveInteger, 30)
  .action(async (_options: unknown, command: Command) => {
    await run(() => scheduleStopCommand(command.optsWithGlobals<ScheduleStopOptions>()));
  });

scheduleCmd
  .command("status")
  .description("Show scheduler state, schedule and last/next run")
  .option("--json", "Output as JSON for scripting")
  .action(async (_options: unknown, command: Command) => {
    await run(() => scheduleStatusCommand(command.optsWithGlobals<ScheduleStatusOptions>()));
  });

scheduleCmd
  .command("run-now")
  .description("Run one cycle with the configured targets and cache policy")
  .action(async (_options: unknown, command: Command) => {
    await run(() => scheduleRunNowCommand(command.optsWithGlobals<GlobalOptions>()));
  });

scheduleCmd
  .command("configure")
  .description("Change the schedule, its target VMs or its cache policy")
  .option("--schedule-type <type>", "interval or cron")
  .option("--interval-unit <unit>", "minutes, hours or days")
  .option("--interval-value <n>", "Interval length in units")
  .option("--cron-expression <expr>", "Five-field cron expression")
  .option("--daily [time]", "Every day at HH:MM (default 00:00)")
  .option("--weekly <args...>", "DAY [HH:MM], e.g. --weekly mon 09:00")
  .option("--monthly <args...>", "DOM [HH:MM], e.g. --monthly 1 06:30")
  .option("--every <args...>", "N {minutes|hours|days}, e.g. --every 2 hours")
  .option("--target-vms <names...>", "Target these VMs")
  .option("--target-all-vms", "Target every VM in the inventory")
  .option("--use-cache", "Skip VMs that were already processed")
  .option("--ignore-cache", "Process every target on each run")
  .action(async (_options: unknown, command: Command) => {
    await run(() => scheduleConfigureCommand(command.optsWithGlobals<ScheduleConfigureOptions>()));
  });

// Cache command group
const cacheCmd = program
  .command("cache")
  .description("Inspect or reset the processing cache");

cacheCmd
  .command("list")
  .description("List VMs whose ping monitoring was enabled")
  .option("--json", "Output as JSON for scripting")
  .action(async (_options: unknown, command: Command) => {
    await run(() => cacheListCommand(command.optsWithGlobals<CacheListOptions>()));
  });

cacheCmd
  .command("clear [vm]")
  .description("Remove one VM, or every VM, from the processing cache")
  .option("-y, --yes", "Clear the whole cache without asking")
  .action(async (vm: string | undefined, _options: unknown, command: Command) => {
    await run(() => cacheClearCommand(vm, command.optsWithGlobals<CacheClearOptions>()));
  });

await program.parseAsync();
