/**
 * Interactive target selection for `pingctl enable`
 */

import { confirm, input, select } from "@inquirer/prompts";
import type { TargetSelector } from "@pingctl/core";

export type SelectionMode = "single" | "multiple" | "all";

/**
 * The subset of @inquirer/prompts used here, injectable for tests
 */
export interface Prompter {
  select(config: {
    message: string;
    choices: { name: string; value: SelectionMode }[];
  }): Promise<SelectionMode>;
  input(config: {
    message: string;
    validate?: (value: string) => boolean | string;
  }): Promise<string>;
  confirm(config: { message: string; default?: boolean }): Promise<boolean>;
}

export const inquirerPrompter: Prompter = {
  select: (config) => select(config),
  input: (config) => input(config),
  confirm: (config) => confirm(config),
};

export interface InteractiveSelection {
  target: TargetSelector;
  force: boolean;
}

/**
 * Split a comma-separated list of VM names, dropping blanks
 */
export function parseVmList(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name !== "");
}

/**
 * Ask which VMs to process and whether to bypass the processing cache
 */
export async function promptForSelection(
  prompter: Prompter = inquirerPrompter
): Promise<InteractiveSelection> {
  const mode = await prompter.select({
    message: "Which VMs should have ping monitoring enabled?",
    choices: [
      { name: "A single VM", value: "single" },
      { name: "Several VMs", value: "multiple" },
      { name: "All VMs", value: "all" },
    ],
  });

  let target: TargetSelector;
  if (mode === "all") {
    target = { kind: "all" };
  } else if (mode === "single") {
    const name = await prompter.input({
      message: "VM name:",
      validate: (value) => value.trim() !== "" || "VM name cannot be empty",
    });
    target = { kind: "explicit", vmNames: [name.trim()] };
  } else {
    const names = await prompter.input({
      message: "VM names (comma-separated):",
      validate: (value) => parseVmList(value).length > 0 || "Enter at least one VM name",
    });
    target = { kind: "explicit", vmNames: parseVmList(names) };
  }

  const force = await prompter.confirm({
    message: "Also process VMs that were already processed before?",
    default: false,
  });

  return { target, force };
}
