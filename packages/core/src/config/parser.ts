/**
 * YAML parsing and validation for pingctl.yaml
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import { ZodError } from "zod";
import { PingctlConfigSchema, type PingctlConfig } from "./schema.js";

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base error class for configuration errors
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "ConfigError";
    this.cause = options?.cause;
  }
}

/**
 * Error thrown when the YAML syntax is invalid
 */
export class YamlSyntaxError extends ConfigError {
  public readonly filePath: string;
  public readonly line?: number;
  public readonly column?: number;

  constructor(error: YAMLParseError, filePath: string) {
    const position = error.linePos?.[0];
    const locationInfo = position ? ` at line ${position.line}, column ${position.col}` : "";
    super(`Invalid YAML syntax in '${filePath}'${locationInfo}: ${error.message}`, {
      cause: error,
    });
    this.name = "YamlSyntaxError";
    this.filePath = filePath;
    this.line = position?.line;
    this.column = position?.col;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Error thrown when the configuration fails schema validation
 */
export class SchemaValidationError extends ConfigError {
  public readonly issues: ValidationIssue[];

  constructor(error: ZodError, filePath?: string) {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join(".") || "(root)",
      message: issue.message,
    }));
    const where = filePath ? ` in '${filePath}'` : "";
    const issueMessages = issues.map((i) => `  - ${i.path}: ${i.message}`).join("\n");
    super(`Configuration validation failed${where}:\n${issueMessages}`, { cause: error });
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}

/**
 * Error thrown when a configuration file cannot be read
 */
export class FileReadError extends ConfigError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    const detail = cause ? `: ${cause.message}` : "";
    super(`Failed to read configuration file '${filePath}'${detail}`, { cause });
    this.name = "FileReadError";
    this.filePath = filePath;
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse YAML text into a plain value
 *
 * An empty document yields an empty object.
 *
 * @throws {YamlSyntaxError} If the YAML is malformed
 */
export function parseYamlDocument(content: string, filePath: string): unknown {
  try {
    return parseYaml(content) ?? {};
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new YamlSyntaxError(error, filePath);
    }
    throw error;
  }
}

/**
 * Validate a parsed (and interpolated) document against the config schema
 *
 * @throws {SchemaValidationError} If validation fails
 */
export function validatePingctlConfig(raw: unknown, filePath?: string): PingctlConfig {
  const result = PingctlConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new SchemaValidationError(result.error, filePath);
  }
  return result.data;
}
