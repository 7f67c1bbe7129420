/**
 * Type definitions for the job runner module
 */

import type {
  CachePolicy,
  TargetSelector,
} from "../state/schemas/schedule-config.js";
import type { EnableOutcome, VirtualMachine } from "../operations/types.js";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * The monitoring platform operations a run cycle needs
 */
export interface MonitoringPlatform {
  /** Host recorded as the source of processing records */
  readonly host: string;
  /** List the full VM inventory, in platform order */
  listVirtualMachines(token: string): Promise<VirtualMachine[]>;
  /**
   * Turn on ping monitoring for a VM given as an inventory entry or by name
   */
  enablePingMonitoring(target: VirtualMachine | string, token: string): Promise<EnableOutcome>;
}

/**
 * Supplies tokens for platform calls
 */
export interface TokenSource {
  getToken(): Promise<string>;
  /** Force the next getToken() to fetch a new token */
  invalidate(): void;
}

// =============================================================================
// Results
// =============================================================================

export type VmOutcome = EnableOutcome | "skipped" | "failed";

/**
 * Result for one target VM, in processing order
 */
export interface VmResult {
  vm: string;
  outcome: VmOutcome;
  /** Error message when outcome is "failed" */
  error?: string;
}

export interface RunFailure {
  vm: string;
  error: string;
}

/**
 * Aggregated result of one run cycle
 */
export interface RunSummary {
  /** Number of target VMs */
  total: number;
  /** Targets for which enablement was attempted (succeeded + failed) */
  attempted: number;
  /** Targets skipped because the processing cache already had them */
  skipped: number;
  succeeded: number;
  failed: number;
  failures: RunFailure[];
  results: VmResult[];
  /** ISO timestamp */
  startedAt: string;
  /** ISO timestamp */
  finishedAt: string;
}

/**
 * Executes one run cycle over a target selection
 */
export interface CycleRunner {
  run(target: TargetSelector, policy: CachePolicy): Promise<RunSummary>;
}
