/**
 * Safe reads of JSON state files
 *
 * Reads never throw: callers get a result object and decide whether a missing
 * or corrupt file is an error. Parse failures are retried briefly in case a
 * writer on a platform without atomic rename is mid-write.
 */

import { readFile } from "node:fs/promises";

/**
 * Error describing a failed read
 */
export class SafeReadError extends Error {
  /** Path of the file that failed to read */
  public readonly path: string;

  /** Error code from the underlying file system error, if any */
  public readonly code?: string;

  constructor(message: string, path: string, cause?: Error) {
    super(message);
    this.name = "SafeReadError";
    this.path = path;
    this.cause = cause;
    if (cause && "code" in cause && typeof cause.code === "string") {
      this.code = cause.code;
    }
  }
}

export type SafeReadResult<T> =
  | { success: true; data: T | null }
  | { success: false; error: SafeReadError };

/**
 * Options for safe reads
 */
export interface SafeReadOptions {
  /** Maximum retries for parse failures. Default: 2 */
  maxRetries?: number;
  /** Base delay between retries in milliseconds. Default: 20 */
  baseDelayMs?: number;
  /** Override the file read (testing) */
  readFn?: (path: string) => Promise<string>;
}

const NON_RETRYABLE_CODES = new Set(["ENOENT", "EACCES", "EPERM", "EISDIR"]);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Read and parse a JSON file
 *
 * An empty or whitespace-only file yields `data: null`.
 */
export async function safeReadJson<T = unknown>(
  filePath: string,
  options: SafeReadOptions = {}
): Promise<SafeReadResult<T>> {
  const {
    maxRetries = 2,
    baseDelayMs = 20,
    readFn = (path: string) => readFile(path, "utf-8"),
  } = options;

  let lastError: SafeReadError | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let content: string;
    try {
      content = await readFn(filePath);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      const readError = new SafeReadError(
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        cause
      );
      if (readError.code !== undefined && NON_RETRYABLE_CODES.has(readError.code)) {
        return { success: false, error: readError };
      }
      lastError = readError;
      if (attempt < maxRetries) {
        await sleep(baseDelayMs * Math.pow(2, attempt));
      }
      continue;
    }

    if (content.trim() === "") {
      return { success: true, data: null };
    }

    try {
      const data: T = JSON.parse(content);
      return { success: true, data };
    } catch (error) {
      lastError = new SafeReadError(
        `Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath,
        error instanceof Error ? error : undefined
      );
      if (attempt < maxRetries) {
        await sleep(baseDelayMs * Math.pow(2, attempt));
      }
    }
  }

  return {
    success: false,
    error: lastError ?? new SafeReadError(`Failed to read ${filePath}`, filePath),
  };
}
