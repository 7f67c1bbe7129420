/**
 * pingctl enable - One-off ping monitoring enablement
 *
 * Targets come from --vm-name or --all-vms; with neither, the command asks
 * interactively when attached to a terminal.
 */

import { loadConfig, type RunSummary, type TargetSelector } from "@pingctl/core";
import { CliUsageError, RunFailuresError } from "../errors.js";
import { formatRunResults } from "../format.js";
import { promptForSelection, type Prompter } from "../prompts.js";
import { createJobRunner, type GlobalOptions, type JobRunnerFactory } from "../runtime.js";

export interface EnableOptions extends GlobalOptions {
  vmName?: string[];
  allVms?: boolean;
  force?: boolean;
}

export interface EnableDependencies {
  createJobRunner?: JobRunnerFactory;
  prompter?: Prompter;
  /** Whether prompting is possible. Default: stdin and stdout are TTYs */
  interactive?: boolean;
}

function isInteractiveTerminal(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true;
}

/**
 * Work out the target selection from the flags alone
 *
 * @returns null when neither --vm-name nor --all-vms was given
 */
export function selectionFromOptions(options: EnableOptions): TargetSelector | null {
  const names = (options.vmName ?? []).map((name) => name.trim()).filter((name) => name !== "");
  const hasNames = options.vmName !== undefined;

  if (hasNames && options.allVms) {
    throw new CliUsageError("Use either --vm-name or --all-vms, not both");
  }
  if (options.allVms) {
    return { kind: "all" };
  }
  if (hasNames) {
    if (names.length === 0) {
      throw new CliUsageError("--vm-name needs at least one non-empty VM name");
    }
    return { kind: "explicit", vmNames: names };
  }
  return null;
}

export async function enableCommand(
  options: EnableOptions,
  deps: EnableDependencies = {}
): Promise<RunSummary> {
  let target = selectionFromOptions(options);
  let force = options.force === true;

  if (target === null) {
    if (!(deps.interactive ?? isInteractiveTerminal())) {
      throw new CliUsageError("Specify --vm-name <names...> or --all-vms");
    }
    const selection = await promptForSelection(deps.prompter);
    target = selection.target;
    force = force || selection.force;
  }

  const resolved = await loadConfig(options.config, { stateDir: options.state });
  const jobRunner = (deps.createJobRunner ?? createJobRunner)(resolved, {
    verbose: options.verbose,
  });

  const summary = await jobRunner.run(target, force ? "ignore_cache" : "use_cache");

  console.log(`\nPing monitoring on ${resolved.config.operations.host}:`);
  for (const line of formatRunResults(summary)) {
    console.log(line);
  }

  if (summary.failed > 0) {
    throw new RunFailuresError(summary.failed, summary.total);
  }
  return summary;
}
