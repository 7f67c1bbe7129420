/**
 * Terminal output helpers shared by the commands
 */

import { formatRunSummary, type RunSummary, type VmResult } from "@pingctl/core";

function describeOutcome(result: VmResult): string {
  switch (result.outcome) {
    case "ping_enabled":
      return "ping enabled";
    case "already_enabled":
      return "already enabled";
    case "skipped":
      return "skipped (already processed)";
    case "failed":
      return `failed: ${result.error ?? "unknown error"}`;
  }
}

/**
 * Render per-VM results followed by the totals line
 */
export function formatRunResults(summary: RunSummary): string[] {
  if (summary.results.length === 0) {
    return ["No VMs matched the selection.", formatRunSummary(summary)];
  }

  const width = Math.max(...summary.results.map((result) => result.vm.length));
  return [
    ...summary.results.map((result) => `  ${result.vm.padEnd(width)}  ${describeOutcome(result)}`),
    "",
    formatRunSummary(summary),
  ];
}

/**
 * Render a label/value table with aligned values
 */
export function formatFields(fields: [label: string, value: string][]): string[] {
  const width = Math.max(...fields.map(([label]) => label.length)) + 1;
  return fields.map(([label, value]) => `${`${label}:`.padEnd(width)} ${value}`);
}
