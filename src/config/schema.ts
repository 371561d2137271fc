/**
 * Configuration schema definitions using Zod.
 *
 * The configuration file is optional; every field has a default so a missing
 * file and an empty file produce the same configuration.
 *
 * @module config/schema
 */

import { z } from "zod";

/** Current configuration schema version */
export const LATEST_SCHEMA_VERSION = 1;

/** Default loopback port for OAuth redirects */
export const DEFAULT_CALLBACK_PORT = 8888;

/** Lowest callback port accepted (no privileged ports) */
export const MIN_CALLBACK_PORT = 1024;

/** Highest callback port accepted */
export const MAX_CALLBACK_PORT = 65535;

/** Default path the identity provider redirects back to */
export const DEFAULT_CALLBACK_PATH = "/callback";

/**
 * Identifiers of the token-exchange strategies a provider can use.
 * - standard: RFC 6749 flat response, client credentials in the body
 * - slack: nested `authed_user` response with an `ok` flag, HTTPS redirect
 * - notion: HTTP Basic client authentication, flat response
 * - linear: standard exchange; API calls send the bare token
 */
export const AdapterIdSchema = z.enum(["standard", "slack", "notion", "linear"]);

/** Token-exchange strategy identifier */
export type AdapterId = z.infer<typeof AdapterIdSchema>;

/**
 * Schema for the loopback OAuth flow settings.
 */
export const OAuthSettingsSchema = z.object({
  /** Port for the local callback listener (default: 8888) */
  callbackPort: z
    .number()
    .int()
    .min(MIN_CALLBACK_PORT)
    .max(MAX_CALLBACK_PORT)
    .default(DEFAULT_CALLBACK_PORT),
  /** Path of the callback endpoint (default: /callback) */
  callbackPath: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*$/, "must be an absolute URL path")
    .default(DEFAULT_CALLBACK_PATH),
  /** How long to wait for the browser redirect (default: 5 minutes) */
  timeoutMs: z.number().int().min(1000).default(300_000),
  /** Token endpoint request timeout (default: 30 seconds) */
  exchangeTimeoutMs: z.number().int().min(1000).default(30_000),
  /** Upper bound for a graceful listener shutdown (default: 5 seconds) */
  shutdownTimeoutMs: z.number().int().min(0).default(5_000),
  /** Launch the default browser automatically (default: true) */
  openBrowser: z.boolean().default(true),
});

/** Loopback OAuth flow settings */
export type OAuthSettings = z.infer<typeof OAuthSettingsSchema>;

/**
 * Schema for a provider entry declared (or overridden) in the config file.
 * Fields left out of an override keep the built-in value.
 */
export const ProviderOverrideSchema = z.object({
  name: z.string().min(1).optional(),
  authType: z.enum(["oauth", "apikey"]).optional(),
  authUrl: z.string().url().optional(),
  tokenUrl: z.string().url().optional(),
  scopes: z.array(z.string().min(1)).optional(),
  apiBaseUrl: z.string().url().optional(),
  requiresHttps: z.boolean().optional(),
  adapter: AdapterIdSchema.optional(),
  setupUrl: z.string().url().optional(),
  setupInstructions: z.string().optional(),
});

/** Provider entry as written in the config file */
export type ProviderOverride = z.infer<typeof ProviderOverrideSchema>;

/**
 * Root configuration schema.
 */
export const ConfigSchema = z.object({
  schemaVersion: z.literal(LATEST_SCHEMA_VERSION).default(LATEST_SCHEMA_VERSION),
  /** Print diagnostic output to stderr */
  debug: z.boolean().default(false),
  oauth: OAuthSettingsSchema.default({}),
  providers: z
    .record(
      z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "must be a lowercase identifier"),
      ProviderOverrideSchema,
    )
    .default({}),
});

/** Complete tokenlink configuration */
export type TokenlinkConfig = z.infer<typeof ConfigSchema>;

/** Default configuration with all defaults applied */
export const DEFAULT_CONFIG: TokenlinkConfig = ConfigSchema.parse({});
