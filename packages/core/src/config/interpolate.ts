/**
 * Environment variable interpolation for configuration values
 *
 * Replaces `${VAR}` and `${VAR:-default}` inside string values, recursively
 * through objects and arrays. The default applies when the variable is unset
 * or empty.
 */

import { ConfigError } from "./parser.js";

export class UndefinedVariableError extends ConfigError {
  public readonly variableName: string;
  /** Dotted path of the config value that referenced the variable */
  public readonly path: string;

  constructor(variableName: string, path: string) {
    super(
      `Undefined environment variable '${variableName}' at '${path}' (no default provided)`
    );
    this.name = "UndefinedVariableError";
    this.variableName = variableName;
    this.path = path;
  }
}

export interface InterpolateOptions {
  env?: Record<string, string | undefined>;
}

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

/**
 * Interpolate variables in a single string
 *
 * @throws {UndefinedVariableError} For an unset variable without default
 */
export function interpolateString(
  value: string,
  env: Record<string, string | undefined>,
  path = "(root)"
): string {
  return value.replace(
    VARIABLE_PATTERN,
    (_match: string, name: string, fallback: string | undefined) => {
      const resolved = env[name];
      if (resolved !== undefined && resolved !== "") {
        return resolved;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      if (resolved !== undefined) {
        return resolved;
      }
      throw new UndefinedVariableError(name, path);
    }
  );
}

function interpolateValue(
  value: unknown,
  env: Record<string, string | undefined>,
  path: string[]
): unknown {
  if (typeof value === "string") {
    return interpolateString(value, env, path.join(".") || "(root)");
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateValue(item, env, [...path, String(index)]));
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateValue(entry, env, [...path, key]);
    }
    return result;
  }
  return value;
}

/**
 * Interpolate every string inside a parsed configuration document
 */
export function interpolateConfig(value: unknown, options: InterpolateOptions = {}): unknown {
  return interpolateValue(value, options.env ?? process.env, []);
}
