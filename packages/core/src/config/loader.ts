/**
 * Configuration loader for pingctl
 *
 * Provides a single entry point to load and resolve configuration:
 * - Auto-discovers pingctl.yaml by walking up the directory tree
 * - Loads a .env file next to the config
 * - Interpolates environment variables
 * - Validates the result and resolves the state directory
 */

import { readFile, access } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve } from "node:path";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import {
  ConfigError,
  FileReadError,
  SchemaValidationError,
  parseYamlDocument,
  validatePingctlConfig,
} from "./parser.js";
import { interpolateConfig } from "./interpolate.js";
import { SchedulerSettingsSchema, type PingctlConfig, type SchedulerSettings } from "./schema.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Default config file names to search for
 */
export const CONFIG_FILE_NAMES = ["pingctl.yaml", "pingctl.yml"] as const;

export const DEFAULT_STATE_DIR = ".pingctl";

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when no configuration file is found
 */
export class ConfigNotFoundError extends ConfigError {
  public readonly searchedPaths: string[];
  public readonly startDirectory: string;

  constructor(startDirectory: string, searchedPaths: string[]) {
    super(
      `No pingctl configuration file found. ` +
        `Searched from '${startDirectory}' up to filesystem root. ` +
        `Create a pingctl.yaml file or pass --config <path>.`
    );
    this.name = "ConfigNotFoundError";
    this.searchedPaths = searchedPaths;
    this.startDirectory = startDirectory;
  }
}

// =============================================================================
// Types
// =============================================================================

/**
 * A loaded configuration with resolved paths
 */
export interface ResolvedConfig {
  config: PingctlConfig;
  /** Absolute path of the config file */
  configPath: string;
  /** Directory containing the config file */
  configDir: string;
  /** Absolute state directory */
  stateDir: string;
}

export interface LoadConfigOptions {
  /**
   * Environment variables for interpolation
   * Defaults to process.env
   */
  env?: Record<string, string | undefined>;

  /**
   * Whether to interpolate environment variables
   * Defaults to true
   */
  interpolate?: boolean;

  /**
   * Path to a .env file to load before interpolating environment variables.
   * - `true` (default): load .env from the config file's directory if it exists
   * - `false`: don't load any .env file
   * - `string`: explicit path to a .env file
   *
   * Variables already present in the environment take precedence.
   */
  envFile?: boolean | string;

  /** Directory discovery starts from. Default: process.cwd() */
  cwd?: string;

  /** State directory override (e.g. --state), resolved against `cwd` */
  stateDir?: string;
}

// =============================================================================
// File Discovery
// =============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find a configuration file by walking up the directory tree
 *
 * Searches for pingctl.yaml or pingctl.yml starting from the given directory
 * and walking up to the filesystem root.
 *
 * @returns The absolute path to the config file, or null if not found
 */
export async function findConfigFile(
  startDir: string
): Promise<{ path: string; searchedPaths: string[] } | null> {
  const searchedPaths: string[] = [];
  let currentDir = resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      searchedPaths.push(configPath);

      if (await fileExists(configPath)) {
        return { path: configPath, searchedPaths };
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Resolve the config file path from an explicit path (file or directory) or
 * by discovery from `cwd`
 */
async function locateConfigFile(configPath: string | undefined, cwd: string): Promise<string> {
  if (configPath && (configPath.endsWith(".yaml") || configPath.endsWith(".yml"))) {
    return resolve(cwd, configPath);
  }

  const startDir = configPath ? resolve(cwd, configPath) : cwd;
  const found = await findConfigFile(startDir);
  if (!found) {
    throw new ConfigNotFoundError(startDir, []);
  }
  return found.path;
}

async function readConfigFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    throw new FileReadError(filePath, error instanceof Error ? error : undefined);
  }
}

/**
 * Merge variables from a .env file into `env` without overriding set values
 */
async function loadEnvFile(
  envFilePath: string,
  env: Record<string, string | undefined>
): Promise<void> {
  if (!(await fileExists(envFilePath))) {
    return;
  }
  const parsed = parseDotenv(await readConfigFile(envFilePath));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

function resolveStatePath(stateDir: string, baseDir: string): string {
  return isAbsolute(stateDir) ? stateDir : resolve(baseDir, stateDir);
}

// =============================================================================
// Main Loading Function
// =============================================================================

/**
 * Load and validate configuration from a file path or by auto-discovery
 *
 * @param configPath - Path to pingctl.yaml, or a directory to search from
 * @throws {ConfigNotFoundError} If no config file is found
 * @throws {FileReadError} If the config file cannot be read
 * @throws {YamlSyntaxError} If YAML syntax is invalid
 * @throws {UndefinedVariableError} If a referenced variable is unset
 * @throws {SchemaValidationError} If configuration fails validation
 *
 * @example
 * ```typescript
 * const { config, stateDir } = await loadConfig();
 * const custom = await loadConfig("./deploy/pingctl.yaml", { envFile: false });
 * ```
 */
export async function loadConfig(
  configPath?: string,
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  const { interpolate = true, envFile = true, cwd = process.cwd() } = options;
  const env: Record<string, string | undefined> = { ...(options.env ?? process.env) };

  const resolvedConfigPath = await locateConfigFile(configPath, cwd);
  const configDir = dirname(resolvedConfigPath);

  if (envFile !== false) {
    const envFilePath =
      typeof envFile === "string" ? resolve(cwd, envFile) : join(configDir, ".env");
    await loadEnvFile(envFilePath, env);
  }

  const content = await readConfigFile(resolvedConfigPath);
  let raw = parseYamlDocument(content, resolvedConfigPath);
  if (interpolate) {
    raw = interpolateConfig(raw, { env });
  }

  const config = validatePingctlConfig(raw, resolvedConfigPath);
  const stateDir =
    options.stateDir !== undefined
      ? resolveStatePath(options.stateDir, cwd)
      : resolveStatePath(config.state_dir, configDir);

  return { config, configPath: resolvedConfigPath, configDir, stateDir };
}

/**
 * Load configuration without throwing on errors
 */
export async function safeLoadConfig(
  configPath?: string,
  options: LoadConfigOptions = {}
): Promise<{ success: true; data: ResolvedConfig } | { success: false; error: ConfigError }> {
  try {
    const config = await loadConfig(configPath, options);
    return { success: true, data: config };
  } catch (error) {
    if (error instanceof ConfigError) {
      return { success: false, error };
    }
    return {
      success: false,
      error: new ConfigError(error instanceof Error ? error.message : String(error)),
    };
  }
}

export interface LocalSettingsOptions {
  /** Explicit state directory (e.g. --state) */
  stateDir?: string;
  /** Explicit config path (e.g. --config) */
  configPath?: string;
  cwd?: string;
}

/**
 * Settings that local commands need: where state lives and how long to wait
 * on it
 */
export interface LocalSettings {
  stateDir: string;
  scheduler: SchedulerSettings;
}

const LocalSettingsSchema = z.object({
  state_dir: z.string().min(1).optional(),
  scheduler: SchedulerSettingsSchema.default({}),
});

/**
 * Read the state directory and scheduler settings without requiring a
 * complete configuration
 *
 * Used by commands that never contact the platform, so missing credentials
 * do not matter here. State directory order: the explicit option;
 * `state_dir` of the config file, when one exists; the default `.pingctl`
 * beside the config, or in `cwd` when there is none.
 *
 * @throws {SchemaValidationError} If `state_dir` or `scheduler` is invalid
 */
export async function loadLocalSettings(options: LocalSettingsOptions = {}): Promise<LocalSettings> {
  const cwd = options.cwd ?? process.cwd();

  let configFile: string | null;
  if (options.configPath !== undefined) {
    configFile = await locateConfigFile(options.configPath, cwd);
  } else {
    const found = await findConfigFile(cwd);
    configFile = found ? found.path : null;
  }

  if (configFile === null) {
    return {
      stateDir: resolveStatePath(options.stateDir ?? DEFAULT_STATE_DIR, cwd),
      scheduler: SchedulerSettingsSchema.parse({}),
    };
  }

  const raw = parseYamlDocument(await readConfigFile(configFile), configFile);
  const result = LocalSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaValidationError(result.error, configFile);
  }

  const stateDir =
    options.stateDir !== undefined
      ? resolveStatePath(options.stateDir, cwd)
      : resolveStatePath(result.data.state_dir ?? DEFAULT_STATE_DIR, dirname(configFile));
  return { stateDir, scheduler: result.data.scheduler };
}
