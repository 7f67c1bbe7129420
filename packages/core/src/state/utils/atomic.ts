/**
 * Atomic file writes
 *
 * Content is written to a temp file in the target's directory and then renamed
 * over the target. A crash before the rename leaves the previous file intact;
 * readers never observe a partially written file.
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";
import { StateFileError } from "../errors.js";

/**
 * Options for atomic writes
 */
export interface AtomicWriteOptions {
  /** JSON indentation. Default: 2 */
  indent?: number;
  /** Override the temp-file write (testing) */
  writeFn?: (path: string, content: string) => Promise<void>;
  /** Override the rename step (testing) */
  renameFn?: (from: string, to: string) => Promise<void>;
}

/**
 * Build the temp-file path used for an atomic write of `filePath`
 */
export function getTempFilePath(filePath: string): string {
  const suffix = `${process.pid}.${randomBytes(4).toString("hex")}`;
  return join(dirname(filePath), `.${basename(filePath)}.${suffix}.tmp`);
}

/**
 * Atomically replace a file's content
 *
 * @throws StateFileError if the content cannot be written or moved into place
 */
export async function atomicWriteFile(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const {
    writeFn = (path: string, data: string) => writeFile(path, data, "utf-8"),
    renameFn = rename,
  } = options;
  const tempPath = getTempFilePath(filePath);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFn(tempPath, content);
    await renameFn(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new StateFileError(
      `Failed to write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      "write",
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Atomically write a value as pretty-printed JSON
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const content = `${JSON.stringify(data, null, options.indent ?? 2)}\n`;
  await atomicWriteFile(filePath, content, options);
}
