/**
 * Configuration module for pingctl
 *
 * Provides discovery, parsing, interpolation and validation of pingctl.yaml
 */

export {
  DurationSchema,
  HostSchema,
  OperationsAuthSchema,
  RetrySchema,
  OperationsSchema,
  TokenSettingsSchema,
  SchedulerSettingsSchema,
  PingctlConfigSchema,
  type OperationsAuth,
  type RetrySettings,
  type OperationsSettings,
  type TokenSettings,
  type SchedulerSettings,
  type PingctlConfig,
  type PingctlConfigInput,
} from "./schema.js";

export {
  ConfigError,
  YamlSyntaxError,
  SchemaValidationError,
  FileReadError,
  parseYamlDocument,
  validatePingctlConfig,
  type ValidationIssue,
} from "./parser.js";

export {
  UndefinedVariableError,
  interpolateString,
  interpolateConfig,
  type InterpolateOptions,
} from "./interpolate.js";

export {
  CONFIG_FILE_NAMES,
  DEFAULT_STATE_DIR,
  ConfigNotFoundError,
  findConfigFile,
  loadConfig,
  safeLoadConfig,
  loadLocalSettings,
  type ResolvedConfig,
  type LoadConfigOptions,
  type LocalSettings,
  type LocalSettingsOptions,
} from "./loader.js";
