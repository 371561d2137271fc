/**
 * Configuration module exports.
 *
 * @module config
 */

export {
  AdapterIdSchema,
  ConfigSchema,
  DEFAULT_CALLBACK_PATH,
  DEFAULT_CALLBACK_PORT,
  DEFAULT_CONFIG,
  LATEST_SCHEMA_VERSION,
  MAX_CALLBACK_PORT,
  MIN_CALLBACK_PORT,
  OAuthSettingsSchema,
  ProviderOverrideSchema,
  type AdapterId,
  type OAuthSettings,
  type ProviderOverride,
  type TokenlinkConfig,
} from "./schema.js";

export {
  CONFIG_PATH_ENV,
  discoverConfigPath,
  ensureDir,
  getCertsDir,
  getCredentialsDir,
  getDefaultConfigPath,
  getTokensDir,
  getUserConfigDir,
  type ConfigPathResult,
  type ConfigSource,
} from "./paths.js";

export {
  ConfigError,
  ConfigParseError,
  ConfigValidationError,
  loadConfig,
  loadConfigFromPath,
  parseConfig,
  type LoadConfigResult,
} from "./load.js";
