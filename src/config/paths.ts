/**
 * Configuration path discovery and management.
 *
 * Everything tokenlink persists lives under a single per-user directory:
 * - config.toml (optional settings)
 * - certs/ (local certificate authority)
 * - tokens/ (access tokens, one JSON file per service)
 * - credentials/ (OAuth client credentials, one JSON file per service)
 *
 * The config file itself can be pointed elsewhere with TOKENLINK_CONFIG.
 *
 * @module config/paths
 */

import { existsSync, mkdirSync } from "node:fs";
import { homedir, platform } from "node:os";
import { join, resolve } from "node:path";

const APP_NAME = "tokenlink";
const CONFIG_FILENAME = "config.toml";
const CERTS_DIR_NAME = "certs";
const TOKENS_DIR_NAME = "tokens";
const CREDENTIALS_DIR_NAME = "credentials";

/** Environment variable that overrides the config file location */
export const CONFIG_PATH_ENV = "TOKENLINK_CONFIG";

/**
 * Source of the discovered configuration file.
 * - env: Found via TOKENLINK_CONFIG
 * - user: Found in the user's config directory
 */
export type ConfigSource = "env" | "user";

/**
 * Result of configuration path discovery.
 */
export interface ConfigPathResult {
  /** Absolute path to the configuration file */
  path: string;
  /** Where the configuration was found */
  source: ConfigSource;
}

function getEnv(key: string): string | undefined {
  const value = process.env[key];
  return value && value.length > 0 ? value : undefined;
}

/**
 * Gets the user-level tokenlink directory.
 * Uses XDG_CONFIG_HOME on Unix, APPDATA on Windows.
 */
export function getUserConfigDir(): string {
  if (platform() === "win32") {
    return join(
      getEnv("APPDATA") ?? join(homedir(), "AppData", "Roaming"),
      APP_NAME,
    );
  }
  return join(getEnv("XDG_CONFIG_HOME") ?? join(homedir(), ".config"), APP_NAME);
}

/** Directory holding the local certificate authority. */
export function getCertsDir(): string {
  return join(getUserConfigDir(), CERTS_DIR_NAME);
}

/** Directory holding stored access tokens. */
export function getTokensDir(): string {
  return join(getUserConfigDir(), TOKENS_DIR_NAME);
}

/** Directory holding stored OAuth client credentials. */
export function getCredentialsDir(): string {
  return join(getUserConfigDir(), CREDENTIALS_DIR_NAME);
}

/**
 * Gets the default configuration file path (user-level).
 */
export function getDefaultConfigPath(): ConfigPathResult {
  return {
    path: join(getUserConfigDir(), CONFIG_FILENAME),
    source: "user",
  };
}

/**
 * Discovers the configuration file path.
 *
 * Search order:
 * 1. TOKENLINK_CONFIG environment variable
 * 2. User-level config ($XDG_CONFIG_HOME/tokenlink/config.toml)
 *
 * @returns Path and source if found, null if no config exists
 */
export function discoverConfigPath(): ConfigPathResult | null {
  const envPath = getEnv(CONFIG_PATH_ENV);
  if (envPath) {
    const resolvedEnvPath = resolve(envPath);
    if (existsSync(resolvedEnvPath)) {
      return { path: resolvedEnvPath, source: "env" };
    }
  }

  const userPath = getDefaultConfigPath();
  if (existsSync(userPath.path)) {
    return userPath;
  }

  return null;
}

/**
 * Creates a directory (and parents) if it does not exist.
 *
 * @param dir - Directory to create
 * @param mode - Permission bits applied on creation
 */
export function ensureDir(dir: string, mode = 0o755): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode });
  }
}
