import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, readdir, readFile, rm, realpath, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { atomicWriteFile, atomicWriteJson, getTempFilePath } from "../atomic.js";
import { StateFileError } from "../../errors.js";

async function createTempDir(): Promise<string> {
  const baseDir = join(
    tmpdir(),
    `pingctl-atomic-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
  );
  await mkdir(baseDir, { recursive: true });
  return await realpath(baseDir);
}

describe("getTempFilePath", () => {
  it("places the temp file beside the target", () => {
    const tempPath = getTempFilePath("/state/schedule.json");

    expect(tempPath).toMatch(
      new RegExp(`^/state/\\.schedule\\.json\\.${process.pid}\\.[0-9a-f]{8}\\.tmp$`)
    );
  });

  it("generates distinct paths for the same target", () => {
    expect(getTempFilePath("/state/a.json")).not.toBe(getTempFilePath("/state/a.json"));
  });
});

describe("atomicWriteJson", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("writes pretty-printed JSON with a trailing newline", async () => {
    const filePath = join(tempDir, "daemon.json");

    await atomicWriteJson(filePath, { status: "running", pid: 42 });

    expect(await readFile(filePath, "utf-8")).toBe(
      '{\n  "status": "running",\n  "pid": 42\n}\n'
    );
  });

  it("creates missing parent directories", async () => {
    const filePath = join(tempDir, "nested", "state", "schedule.json");

    await atomicWriteJson(filePath, { enabled: false });

    expect(JSON.parse(await readFile(filePath, "utf-8"))).toEqual({ enabled: false });
  });

  it("replaces existing content and leaves no temp files", async () => {
    const filePath = join(tempDir, "schedule.json");
    await atomicWriteJson(filePath, { version: 1 });

    await atomicWriteJson(filePath, { version: 2 });

    expect(JSON.parse(await readFile(filePath, "utf-8"))).toEqual({ version: 2 });
    expect(await readdir(tempDir)).toEqual(["schedule.json"]);
  });
});

describe("atomicWriteFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("keeps the previous file intact when the rename fails", async () => {
    const filePath = join(tempDir, "schedule.json");
    await writeFile(filePath, '{"schedule_type":"cron"}\n', "utf-8");

    await expect(
      atomicWriteFile(filePath, '{"schedule_type":"interval"}\n', {
        renameFn: async () => {
          throw new Error("simulated crash");
        },
      })
    ).rejects.toBeInstanceOf(StateFileError);

    expect(await readFile(filePath, "utf-8")).toBe('{"schedule_type":"cron"}\n');
    expect(await readdir(tempDir)).toEqual(["schedule.json"]);
  });

  it("reports the path and operation of a failed write", async () => {
    const filePath = join(tempDir, "schedule.json");

    const error = await atomicWriteFile(filePath, "{}", {
      writeFn: async () => {
        throw new Error("disk full");
      },
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StateFileError);
    if (error instanceof StateFileError) {
      expect(error.path).toBe(filePath);
      expect(error.operation).toBe("write");
      expect(error.message).toBe(`Failed to write ${filePath}: disk full`);
    }
  });
});
