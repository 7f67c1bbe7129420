/**
 * Zod schema for the scheduler daemon run state (daemon.json)
 */

import { z } from "zod";

/**
 * Lifecycle of the scheduler daemon
 */
export const DaemonStatusSchema = z.enum(["stopped", "starting", "running", "stopping"]);

export const DaemonRunStateSchema = z.object({
  status: DaemonStatusSchema.default("stopped"),
  /** PID of the process that owns the scheduler loop */
  pid: z.number().int().positive().nullable().default(null),
  /** ISO timestamp of when the daemon was started */
  started_at: z.string().nullable().default(null),
  /** ISO timestamp of the last heartbeat written by the loop */
  heartbeat_at: z.string().nullable().default(null),
});

export type DaemonStatus = z.infer<typeof DaemonStatusSchema>;
export type DaemonRunState = z.infer<typeof DaemonRunStateSchema>;

/**
 * Create the run state of a daemon that is not running
 */
export function createStoppedDaemonState(): DaemonRunState {
  return {
    status: "stopped",
    pid: null,
    started_at: null,
    heartbeat_at: null,
  };
}
