import { readFileSync } from "node:fs";
import { parse as parseToml } from "smol-toml";
import { ZodError } from "zod";
import {
  type ConfigSource,
  discoverConfigPath,
  getDefaultConfigPath,
} from "./paths.js";
import { ConfigSchema, DEFAULT_CONFIG, type TokenlinkConfig } from "./schema.js";

export class ConfigError extends Error {
  override cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "ConfigError";
    this.cause = cause;
  }
}

export class ConfigParseError extends ConfigError {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Failed to parse config file: ${filePath}${detail}`, cause);
    this.name = "ConfigParseError";
  }
}

export class ConfigValidationError extends ConfigError {
  constructor(
    public readonly filePath: string,
    public readonly zodError: ZodError,
  ) {
    const issues = zodError.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    super(`Invalid configuration in ${filePath}:\n${issues}`, zodError);
    this.name = "ConfigValidationError";
  }
}

export interface LoadConfigResult {
  config: TokenlinkConfig;
  path: string;
  source: ConfigSource;
  /** False when no file was found and defaults were used */
  exists: boolean;
}

/**
 * Loads the configuration, falling back to defaults when no file exists.
 */
export function loadConfig(): LoadConfigResult {
  const discovered = discoverConfigPath();

  if (!discovered) {
    return {
      config: DEFAULT_CONFIG,
      path: getDefaultConfigPath().path,
      source: "user",
      exists: false,
    };
  }

  return loadConfigFromPath(discovered.path, discovered.source);
}

/**
 * Parses a TOML string into a validated configuration.
 *
 * @param content - Raw TOML text
 * @param filePath - Path used in error messages
 * @throws ConfigParseError if the TOML is malformed
 * @throws ConfigValidationError if the values fail schema validation
 */
export function parseConfig(content: string, filePath: string): TokenlinkConfig {
  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (err) {
    throw new ConfigParseError(filePath, err);
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(filePath, result.error);
  }
  return result.data;
}

export function loadConfigFromPath(
  filePath: string,
  source: ConfigSource,
): LoadConfigResult {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigParseError(filePath, err);
  }

  return {
    config: parseConfig(content, filePath),
    path: filePath,
    source,
    exists: true,
  };
}
