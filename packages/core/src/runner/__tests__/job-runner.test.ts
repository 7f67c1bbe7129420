import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rm } from "node:fs/promises";
import { join } from "node:path";
import { JobRunner, formatRunSummary } from "../job-runner.js";
import { CycleLockError, InventoryError } from "../errors.js";
import {
  AuthError,
  NetworkError,
  UnauthorizedError,
  VmNotFoundError,
} from "../../operations/errors.js";
import { StateCache } from "../../state/state-cache.js";
import { acquireFileLock } from "../../state/utils/lock.js";
import {
  FakeClock,
  FakePlatform,
  FakeTokenSource,
  createMockLogger,
  createTempDir,
  vm,
} from "../../__tests__/fakes.js";

const T0 = "2025-03-01T10:00:00.000Z";

describe("JobRunner", () => {
  let stateDir: string;
  let clock: FakeClock;
  let platform: FakePlatform;
  let tokens: FakeTokenSource;
  let cache: StateCache;

  function createRunner(concurrency = 1): JobRunner {
    return new JobRunner({
      stateDir,
      platform,
      tokens,
      cache,
      clock,
      logger: createMockLogger(),
      concurrency,
    });
  }

  beforeEach(async () => {
    stateDir = await createTempDir("pingctl-runner");
    clock = new FakeClock(T0);
    platform = new FakePlatform([vm("app-01"), vm("app-02", true), vm("app-03")]);
    tokens = new FakeTokenSource();
    cache = new StateCache(stateDir, { logger: createMockLogger() });
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Target resolution
  // ===========================================================================

  describe("targets", () => {
    it("processes the whole inventory in platform order", async () => {
      const summary = await createRunner().run({ kind: "all" }, "use_cache");

      expect(platform.listCalls).toBe(1);
      expect(summary.results).toEqual([
        { vm: "app-01", outcome: "ping_enabled" },
        { vm: "app-02", outcome: "already_enabled" },
        { vm: "app-03", outcome: "ping_enabled" },
      ]);
      expect(summary).toMatchObject({
        total: 3,
        attempted: 3,
        skipped: 0,
        succeeded: 3,
        failed: 0,
        failures: [],
        startedAt: T0,
        finishedAt: T0,
      });
    });

    it("uses explicit names verbatim without listing the inventory", async () => {
      const summary = await createRunner().run(
        { kind: "explicit", vmNames: ["db-02", "db-01"] },
        "use_cache"
      );

      expect(platform.listCalls).toBe(0);
      expect(platform.enableCalls.map((c) => c.vm)).toEqual(["db-02", "db-01"]);
      expect(summary.succeeded).toBe(2);
    });

    it("wraps an inventory failure in InventoryError", async () => {
      platform.failNext("*list*", new NetworkError("connection refused", { endpoint: "/r" }));

      const error = await createRunner()
        .run({ kind: "all" }, "use_cache")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InventoryError);
      expect(error).toHaveProperty("message", "Failed to list VMs on ops.test: connection refused");
      expect(platform.enableCalls).toEqual([]);
    });
  });

  // ===========================================================================
  // Processing cache
  // ===========================================================================

  describe("cache policy", () => {
    it("records each success with its action", async () => {
      await createRunner().run({ kind: "all" }, "use_cache");

      expect(await cache.getRecord("app-01")).toEqual({
        first_processed_at: T0,
        last_processed_at: T0,
        source_host: "ops.test",
        times_processed: 1,
        last_action: "ping_enabled",
      });
      expect((await cache.getRecord("app-02"))?.last_action).toBe("already_enabled");
    });

    it("skips recorded VMs under use_cache", async () => {
      await cache.recordSuccess("app-02", "ops.test", new Date("2025-02-01T00:00:00.000Z"));

      const summary = await createRunner().run({ kind: "all" }, "use_cache");

      expect(platform.enableCalls.map((c) => c.vm)).toEqual(["app-01", "app-03"]);
      expect(summary.results[1]).toEqual({ vm: "app-02", outcome: "skipped" });
      expect(summary).toMatchObject({ total: 3, attempted: 2, skipped: 1, succeeded: 2 });
    });

    it("processes recorded VMs again under ignore_cache", async () => {
      await cache.recordSuccess("app-02", "ops.test", new Date("2025-02-01T00:00:00.000Z"));

      const summary = await createRunner().run({ kind: "all" }, "ignore_cache");

      expect(summary.skipped).toBe(0);
      expect(await cache.getRecord("app-02")).toMatchObject({
        first_processed_at: "2025-02-01T00:00:00.000Z",
        last_processed_at: T0,
        times_processed: 2,
      });
    });
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe("failures", () => {
    it("reports a failing VM and carries on with the rest", async () => {
      platform.failNext("app-02", new VmNotFoundError("app-02"));

      const summary = await createRunner().run({ kind: "all" }, "use_cache");

      expect(summary.failures).toEqual([
        { vm: "app-02", error: 'VM "app-02" was not found on the operations platform' },
      ]);
      expect(summary).toMatchObject({ attempted: 3, succeeded: 2, failed: 1 });
      expect(await cache.getRecord("app-02")).toBeNull();
      expect(await cache.getRecord("app-03")).not.toBeNull();
    });

    it("invalidates the token and retries once after a 401", async () => {
      platform.failNext("app-01", new UnauthorizedError("/suite-api/api/resources"));

      const summary = await createRunner().run(
        { kind: "explicit", vmNames: ["app-01"] },
        "use_cache"
      );

      expect(tokens.invalidations).toBe(1);
      expect(platform.enableCalls).toEqual([
        { vm: "app-01", token: "token-1" },
        { vm: "app-01", token: "token-2" },
      ]);
      expect(summary.succeeded).toBe(1);
    });

    it("aborts the cycle when a fresh token is rejected too", async () => {
      platform.failNext("app-02", new UnauthorizedError("/suite-api/api/resources"));
      platform.failNext("app-02", new UnauthorizedError("/suite-api/api/resources"));

      const error = await createRunner()
        .run({ kind: "explicit", vmNames: ["app-01", "app-02", "app-03"] }, "use_cache")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthError);
      expect(error).toHaveProperty("message", "Platform rejected a freshly acquired token");
      expect(platform.enableCalls.map((c) => c.vm)).toEqual(["app-01", "app-02", "app-02"]);
      expect(await cache.getRecord("app-01")).not.toBeNull();
      expect(await cache.getRecord("app-03")).toBeNull();
    });

    it("aborts the cycle when no token can be acquired", async () => {
      tokens.failures.push(new AuthError("Failed to acquire token: bad credentials"));

      await expect(
        createRunner().run({ kind: "explicit", vmNames: ["app-01"] }, "use_cache")
      ).rejects.toThrow("Failed to acquire token: bad credentials");
      expect(platform.enableCalls).toEqual([]);
    });
  });

  // ===========================================================================
  // Concurrency
  // ===========================================================================

  describe("concurrency", () => {
    it("keeps result order and records every VM with parallel workers", async () => {
      const names = ["vm-a", "vm-b", "vm-c", "vm-d", "vm-e"];

      const summary = await createRunner(3).run({ kind: "explicit", vmNames: names }, "use_cache");

      expect(summary.results.map((r) => r.vm)).toEqual(names);
      const records = await cache.listRecords();
      expect(records.map((r) => [r.vm, r.times_processed])).toEqual(
        names.map((name) => [name, 1])
      );
    });
  });

  describe("cycle lock", () => {
    it("fails with CycleLockError when another cycle holds the lock", async () => {
      const release = await acquireFileLock(join(stateDir, "cycle"));
      const runner = new JobRunner({
        stateDir,
        platform,
        tokens,
        cache,
        clock,
        logger: createMockLogger(),
        cycleLock: { timeoutMs: 100, pollIntervalMs: 10 },
      });

      try {
        await expect(runner.run({ kind: "all" }, "use_cache")).rejects.toBeInstanceOf(
          CycleLockError
        );
      } finally {
        await release();
      }
      expect(platform.listCalls).toBe(0);
    });

    it("waits for the lock to be released", async () => {
      const release = await acquireFileLock(join(stateDir, "cycle"));
      const runner = new JobRunner({
        stateDir,
        platform,
        tokens,
        cache,
        clock,
        logger: createMockLogger(),
        cycleLock: { timeoutMs: 5000, pollIntervalMs: 10 },
      });

      const pending = runner.run({ kind: "all" }, "use_cache");
      await new Promise((resolve) => setTimeout(resolve, 50));
      expect(platform.listCalls).toBe(0);
      await release();

      await expect(pending).resolves.toMatchObject({ succeeded: 3 });
    });
  });
});

describe("formatRunSummary", () => {
  it("renders the counts", () => {
    expect(
      formatRunSummary({
        total: 4,
        attempted: 3,
        skipped: 1,
        succeeded: 2,
        failed: 1,
        failures: [{ vm: "x", error: "boom" }],
        results: [],
        startedAt: T0,
        finishedAt: T0,
      })
    ).toBe("4 target(s): 2 succeeded, 1 failed, 1 skipped");
  });
});
