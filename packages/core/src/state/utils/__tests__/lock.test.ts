import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readFile, rm, realpath, utimes, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { acquireFileLock, getLockPath, withFileLock } from "../lock.js";
import { LockTimeoutError } from "../../errors.js";

async function createTempDir(): Promise<string> {
  const baseDir = join(
    tmpdir(),
    `pingctl-lock-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  await mkdir(baseDir, { recursive: true });
  return await realpath(baseDir);
}

describe("getLockPath", () => {
  it("appends .lock to the guarded path", () => {
    expect(getLockPath("/state/schedule.json")).toBe("/state/schedule.json.lock");
  });
});

describe("withFileLock", () => {
  let tempDir: string;
  let target: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    target = join(tempDir, "schedule.json");
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("writes the owner pid while held and removes the lock afterwards", async () => {
    const content = await withFileLock(target, () => readFile(getLockPath(target), "utf-8"));

    expect(content).toBe(`${process.pid}\n`);
    expect(existsSync(getLockPath(target))).toBe(false);
  });

  it("releases the lock when the callback throws", async () => {
    await expect(
      withFileLock(target, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(existsSync(getLockPath(target))).toBe(false);
  });

  it("serializes concurrent critical sections", async () => {
    const events: string[] = [];
    const section = (name: string) =>
      withFileLock(
        target,
        async () => {
          events.push(`${name}:enter`);
          await new Promise((resolve) => setTimeout(resolve, 20));
          events.push(`${name}:exit`);
        },
        { pollIntervalMs: 5 }
      );

    await Promise.all([section("a"), section("b")]);

    expect(events).toHaveLength(4);
    expect(events[0].endsWith(":enter")).toBe(true);
    expect(events[1]).toBe(events[0].replace("enter", "exit"));
  });

  it("times out while a live holder keeps the lock", async () => {
    await writeFile(getLockPath(target), "4242\n", "utf-8");

    const error = await withFileLock(target, async () => "never", {
      timeoutMs: 30,
      pollIntervalMs: 5,
      isProcessAlive: () => true,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LockTimeoutError);
    if (error instanceof LockTimeoutError) {
      expect(error.holderPid).toBe(4242);
      expect(error.timeoutMs).toBe(30);
      expect(error.lockPath).toBe(getLockPath(target));
    }
  });

  it("breaks a lock whose holder is dead", async () => {
    await writeFile(getLockPath(target), "4242\n", "utf-8");

    const result = await withFileLock(target, async () => "acquired", {
      timeoutMs: 100,
      isProcessAlive: (pid) => pid !== 4242,
    });

    expect(result).toBe("acquired");
  });

  it("breaks a lock older than the stale threshold", async () => {
    const lockPath = getLockPath(target);
    await writeFile(lockPath, "4242\n", "utf-8");
    const old = new Date(Date.now() - 120_000);
    await utimes(lockPath, old, old);

    const result = await withFileLock(target, async () => "acquired", {
      timeoutMs: 100,
      staleMs: 60_000,
      isProcessAlive: () => true,
    });

    expect(result).toBe("acquired");
  });

  it("keeps an old lock when staleness is disabled", async () => {
    const lockPath = getLockPath(target);
    await writeFile(lockPath, "4242\n", "utf-8");
    const old = new Date(Date.now() - 120_000);
    await utimes(lockPath, old, old);

    await expect(
      withFileLock(target, async () => "acquired", {
        timeoutMs: 20,
        pollIntervalMs: 5,
        staleMs: Infinity,
        isProcessAlive: () => true,
      })
    ).rejects.toBeInstanceOf(LockTimeoutError);
  });
});

describe("acquireFileLock", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("returns an idempotent release function", async () => {
    const target = join(tempDir, "cycle");
    const release = await acquireFileLock(target);

    await release();
    await release();

    expect(existsSync(getLockPath(target))).toBe(false);
  });
});
