/**
 * Shared fixtures for the command tests
 */

import { mkdirSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type {
  CachePolicy,
  CycleRunner,
  RunSummary,
  TargetSelector,
  VmResult,
} from "@pingctl/core";

export function createTempDir(prefix = "pingctl-cli-test"): string {
  const baseDir = join(tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(baseDir, { recursive: true });
  return realpathSync(baseDir);
}

export function cleanupTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a complete pingctl.yaml with placeholder credentials
 *
 * @returns Path of the written file
 */
export function writeConfig(dir: string, extra = ""): string {
  const configPath = join(dir, "pingctl.yaml");
  writeFileSync(
    configPath,
    `version: 1
operations:
  host: ops.example.test
  auth:
    username: svc-monitor
    password: test-secret
${extra}`,
    "utf-8"
  );
  return configPath;
}

export interface ConsoleCapture {
  /** console.log lines */
  output: string[];
  /** console.debug/info/warn/error lines, as written by loggers */
  logged: string[];
  restore(): void;
}

export function captureConsole(): ConsoleCapture {
  const original = {
    log: console.log,
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };
  const output: string[] = [];
  const logged: string[] = [];

  console.log = (...args: unknown[]) => output.push(args.join(" "));
  const record = (...args: unknown[]) => logged.push(args.join(" "));
  console.debug = record;
  console.info = record;
  console.warn = record;
  console.error = record;

  return {
    output,
    logged,
    restore: () => {
      Object.assign(console, original);
    },
  };
}

/**
 * Build a summary the way the job runner totals results
 */
export function makeSummary(results: VmResult[]): RunSummary {
  const succeeded = results.filter(
    (r) => r.outcome === "ping_enabled" || r.outcome === "already_enabled"
  ).length;
  const failures = results
    .filter((r) => r.outcome === "failed")
    .map((r) => ({ vm: r.vm, error: r.error ?? "" }));
  return {
    total: results.length,
    attempted: succeeded + failures.length,
    skipped: results.filter((r) => r.outcome === "skipped").length,
    succeeded,
    failed: failures.length,
    failures,
    results,
    startedAt: "2026-03-02T09:00:00.000Z",
    finishedAt: "2026-03-02T09:00:05.000Z",
  };
}

/**
 * Cycle runner that records its calls and answers with a fixed summary
 */
export class FakeCycleRunner implements CycleRunner {
  readonly calls: { target: TargetSelector; policy: CachePolicy }[] = [];

  constructor(private readonly summary: RunSummary) {}

  async run(target: TargetSelector, policy: CachePolicy): Promise<RunSummary> {
    this.calls.push({ target, policy });
    return this.summary;
  }
}
