/**
 * @pingctl/core
 *
 * Core library for pingctl - scheduled ping monitoring enablement
 *
 * This package provides:
 * - Config parsing (pingctl.yaml)
 * - State management (.pingctl/ directory, processing cache)
 * - Operations platform client and token management
 * - Job runner (one enablement cycle)
 * - Scheduler (friendly schedules, interval, cron, daemon lifecycle)
 */

import { createRequire } from "module";
const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

export const VERSION = pkg.version;

export * from "./config/index.js";

export * from "./state/index.js";

export * from "./operations/index.js";

export * from "./runner/index.js";

export * from "./scheduler/index.js";

export {
  createLogger,
  createDefaultLogger,
  resolveLogLevel,
  isLogLevel,
  errorMessage,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./utils/logger.js";

export { isProcessAlive, type ProcessAliveCheck } from "./utils/process.js";
