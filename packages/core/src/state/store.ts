/**
 * Durable JSON document store
 *
 * Wraps one JSON file with a zod schema, a default value, atomic writes and an
 * advisory lock for read-modify-write cycles. Reads self-heal: a missing,
 * unparseable or schema-invalid file yields the default value.
 */

import type { z } from "zod";
import { atomicWriteJson } from "./utils/atomic.js";
import { safeReadJson } from "./utils/reads.js";
import { withFileLock, type FileLockOptions } from "./utils/lock.js";
import { createDefaultLogger, type Logger } from "../utils/logger.js";

// =============================================================================
// Types
// =============================================================================

/**
 * How a read resolved its value
 *
 * - ok: the file existed and was valid
 * - missing: no file (or an empty one); the default was used
 * - corrupt: the file was unparseable or failed validation; the default was used
 */
export type StoreReadStatus = "ok" | "missing" | "corrupt";

export interface StoreReadResult<T> {
  value: T;
  status: StoreReadStatus;
  /** Why the file was rejected, when status is "corrupt" */
  problem?: string;
}

export interface JsonStoreOptions<T> {
  /** Path of the JSON file */
  path: string;
  /** Schema the file content must satisfy */
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Factory for the value used when the file is missing or corrupt */
  defaultValue: () => T;
  /** Logger for self-heal warnings */
  logger?: Logger;
  /** Lock options for update(). Default timeout: 10s */
  lock?: FileLockOptions;
}

// =============================================================================
// JsonStore
// =============================================================================

export class JsonStore<T> {
  readonly path: string;
  private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private readonly defaultValue: () => T;
  private readonly logger: Logger;
  private readonly lockOptions: FileLockOptions;

  constructor(options: JsonStoreOptions<T>) {
    this.path = options.path;
    this.schema = options.schema;
    this.defaultValue = options.defaultValue;
    this.logger = options.logger ?? createDefaultLogger("state");
    this.lockOptions = options.lock ?? {};
  }

  /**
   * Read the document, reporting whether the default had to be used
   *
   * Never throws for missing or corrupt content and never logs.
   */
  async readDetailed(): Promise<StoreReadResult<T>> {
    const result = await safeReadJson(this.path);

    if (!result.success) {
      if (result.error.code === "ENOENT") {
        return { value: this.defaultValue(), status: "missing" };
      }
      return {
        value: this.defaultValue(),
        status: "corrupt",
        problem: result.error.message,
      };
    }

    if (result.data === null) {
      return { value: this.defaultValue(), status: "missing" };
    }

    const parsed = this.schema.safeParse(result.data);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      return {
        value: this.defaultValue(),
        status: "corrupt",
        problem: `Invalid content in ${this.path}: ${issues}`,
      };
    }

    return { value: parsed.data, status: "ok" };
  }

  /**
   * Read the document, falling back to the default with a warning when corrupt
   */
  async read(): Promise<T> {
    const result = await this.readDetailed();
    if (result.status === "corrupt") {
      this.logger.warn(`${result.problem ?? `Corrupt file ${this.path}`}. Using defaults.`);
    }
    return result.value;
  }

  /**
   * Replace the document atomically
   */
  async write(value: T): Promise<void> {
    await atomicWriteJson(this.path, value);
  }

  /**
   * Read, transform and write the document while holding its file lock
   *
   * @returns The value that was written
   */
  async update(fn: (current: T) => T | Promise<T>): Promise<T> {
    return withFileLock(
      this.path,
      async () => {
        const next = await fn(await this.read());
        await this.write(next);
        return next;
      },
      this.lockOptions
    );
  }

  /**
   * Run `fn` while holding the file lock, without reading or writing
   */
  async withLock<R>(fn: () => Promise<R>): Promise<R> {
    return withFileLock(this.path, fn, this.lockOptions);
  }
}
