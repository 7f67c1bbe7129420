/**
 * Zod schemas for the processing cache (processed-vms.json)
 *
 * Maps a VM identifier to the record of its successful ping enablements.
 * Entries written by older releases are migrated on read.
 */

import { z } from "zod";

/**
 * What the last successful enablement did
 */
export const ProcessingActionSchema = z.enum(["ping_enabled", "already_enabled"]);

export const ProcessingRecordSchema = z.object({
  /** ISO timestamp of the first successful enablement */
  first_processed_at: z.string(),
  /** ISO timestamp of the most recent successful enablement */
  last_processed_at: z.string(),
  /** Monitoring platform host that performed the update */
  source_host: z.string(),
  times_processed: z.number().int().min(1),
  last_action: ProcessingActionSchema.optional(),
});

export type ProcessingAction = z.infer<typeof ProcessingActionSchema>;
export type ProcessingRecord = z.infer<typeof ProcessingRecordSchema>;

// Oldest format: VM id -> timestamp string
const LegacyTimestampSchema = z.string().transform(
  (timestamp): ProcessingRecord => ({
    first_processed_at: timestamp,
    last_processed_at: timestamp,
    source_host: "unknown",
    times_processed: 1,
  })
);

// Intermediate format: { name, first_processed, last_processed, ops_source, action }
const LegacyObjectSchema = z
  .object({
    first_processed: z.string(),
    last_processed: z.string(),
    ops_source: z.string().optional(),
    action: z.string().optional(),
  })
  .transform(
    (legacy): ProcessingRecord => ({
      first_processed_at: legacy.first_processed,
      last_processed_at: legacy.last_processed,
      source_host: legacy.ops_source ?? "unknown",
      times_processed: 1,
      ...(legacy.action === "ping_enabled" || legacy.action === "already_enabled"
        ? { last_action: legacy.action }
        : {}),
    })
  );

/**
 * Schema of one cache entry, current or legacy
 */
export const ProcessingEntrySchema = z.union([
  ProcessingRecordSchema,
  LegacyObjectSchema,
  LegacyTimestampSchema,
]);

/**
 * Schema of the whole cache file
 *
 * Entries are checked one by one with parseProcessingCache so an invalid
 * entry never discards the others.
 */
export const ProcessingCacheSchema = z.record(z.string(), z.unknown());

export type ProcessingCache = Record<string, ProcessingRecord>;

export interface InvalidProcessingEntry {
  vm: string;
  problem: string;
}

export interface ParsedProcessingCache {
  records: ProcessingCache;
  invalid: InvalidProcessingEntry[];
}

/**
 * Validate every entry of a raw cache file, migrating legacy shapes
 */
export function parseProcessingCache(raw: Record<string, unknown>): ParsedProcessingCache {
  const records: ProcessingCache = {};
  const invalid: InvalidProcessingEntry[] = [];

  for (const [vm, value] of Object.entries(raw)) {
    const parsed = ProcessingEntrySchema.safeParse(value);
    if (parsed.success) {
      records[vm] = parsed.data;
    } else {
      invalid.push({
        vm,
        problem: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
    }
  }

  return { records, invalid };
}
