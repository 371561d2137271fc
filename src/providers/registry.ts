/**
 * Provider registry: endpoints, scopes and setup help per service.
 *
 * Built-in entries can be overridden, and new providers added, from the
 * `[providers.<id>]` tables of the config file.
 *
 * @module providers/registry
 */

import { ConfigError } from "../config/load.js";
import type {
  AdapterId,
  ProviderOverride,
  TokenlinkConfig,
} from "../config/schema.js";
import { getAdapter } from "./adapters.js";

/** How a service authenticates. */
export type AuthType = "oauth" | "apikey";

/**
 * Everything tokenlink knows about one service.
 */
export interface ProviderEntry {
  /** Unique identifier (e.g. "slack") */
  id: string;
  /** Display name (e.g. "Slack") */
  name: string;
  authType: AuthType;
  /** OAuth authorization endpoint ("" for API-key services) */
  authUrl: string;
  /** OAuth token endpoint ("" for API-key services) */
  tokenUrl: string;
  scopes: string[];
  /** Base URL for API requests made with the token */
  apiBaseUrl: string;
  /** Redirect must be https even on loopback */
  requiresHttps: boolean;
  adapter: AdapterId;
  /** Where to create the OAuth app or API key */
  setupUrl: string;
  setupInstructions: string;
}

/**
 * Thrown for a service id that is neither built in nor configured.
 */
export class UnknownServiceError extends Error {
  constructor(
    public readonly serviceId: string,
    public readonly supported: string[],
  ) {
    super(
      `Unknown service: ${serviceId}\n\nSupported services: ${supported.join(", ")}`,
    );
    this.name = "UnknownServiceError";
  }
}

export const BUILTIN_PROVIDERS: readonly ProviderEntry[] = [
  {
    id: "slack",
    name: "Slack",
    authType: "oauth",
    authUrl: "https://slack.com/oauth/v2/authorize",
    tokenUrl: "https://slack.com/api/oauth.v2.access",
    scopes: [
      "channels:read",
      "channels:history",
      "groups:read",
      "groups:history",
      "chat:write",
      "users:read",
    ],
    apiBaseUrl: "https://slack.com/api",
    requiresHttps: true,
    adapter: "slack",
    setupUrl: "https://api.slack.com/apps",
    setupInstructions: `1. Go to https://api.slack.com/apps
2. Click "Create New App" → "From scratch"
3. Name the app and select your workspace
4. Open "OAuth & Permissions" and add the redirect URL shown below
5. Under "User Token Scopes", add:
   channels:read, channels:history, groups:read, groups:history,
   chat:write, users:read
6. Copy the Client ID and Client Secret from "Basic Information"`,
  },
  {
    id: "notion",
    name: "Notion",
    authType: "oauth",
    authUrl: "https://api.notion.com/v1/oauth/authorize",
    tokenUrl: "https://api.notion.com/v1/oauth/token",
    scopes: [],
    apiBaseUrl: "https://api.notion.com",
    requiresHttps: false,
    adapter: "notion",
    setupUrl: "https://www.notion.so/my-integrations",
    setupInstructions: `1. Go to https://www.notion.so/my-integrations
2. Create a new public integration
3. Add the redirect URI shown below
4. Copy the OAuth client ID and OAuth client secret

After signing in, share the pages you want to use with the integration.`,
  },
  {
    id: "linear",
    name: "Linear",
    authType: "oauth",
    authUrl: "https://linear.app/oauth/authorize",
    tokenUrl: "https://api.linear.app/oauth/token",
    scopes: ["read", "write", "issues:create", "comments:create"],
    apiBaseUrl: "https://api.linear.app",
    requiresHttps: false,
    adapter: "linear",
    setupUrl: "https://linear.app/settings/api",
    setupInstructions: `1. Go to https://linear.app/settings/api
2. Under "OAuth applications", create a new application
3. Add the redirect URI shown below
4. Copy the Client ID and Client Secret`,
  },
  {
    id: "honeycomb",
    name: "Honeycomb",
    authType: "apikey",
    authUrl: "",
    tokenUrl: "",
    scopes: [],
    apiBaseUrl: "https://api.honeycomb.io",
    requiresHttps: false,
    adapter: "standard",
    setupUrl: "https://ui.honeycomb.io/account",
    setupInstructions: `1. Go to https://ui.honeycomb.io/account
2. Open "Team settings" → "API Keys"
3. Create an API key with the permissions you need and copy it`,
  },
];

function applyOverride(
  id: string,
  base: ProviderEntry | undefined,
  override: ProviderOverride,
): ProviderEntry {
  const entry: ProviderEntry = {
    id,
    name: override.name ?? base?.name ?? id,
    authType: override.authType ?? base?.authType ?? "oauth",
    authUrl: override.authUrl ?? base?.authUrl ?? "",
    tokenUrl: override.tokenUrl ?? base?.tokenUrl ?? "",
    scopes: override.scopes ?? base?.scopes ?? [],
    apiBaseUrl: override.apiBaseUrl ?? base?.apiBaseUrl ?? "",
    requiresHttps: override.requiresHttps ?? base?.requiresHttps ?? false,
    adapter: override.adapter ?? base?.adapter ?? "standard",
    setupUrl: override.setupUrl ?? base?.setupUrl ?? "",
    setupInstructions:
      override.setupInstructions ?? base?.setupInstructions ?? "",
  };

  if (entry.authType === "oauth" && (!entry.authUrl || !entry.tokenUrl)) {
    throw new ConfigError(
      `Provider '${id}' uses OAuth but is missing authUrl or tokenUrl`,
    );
  }

  return entry;
}

/**
 * Built-in providers merged with the config file's provider tables.
 *
 * @throws ConfigError if a configured OAuth provider lacks endpoints
 */
export function listServices(
  config?: Pick<TokenlinkConfig, "providers">,
): ProviderEntry[] {
  const entries = new Map<string, ProviderEntry>();
  for (const entry of BUILTIN_PROVIDERS) {
    entries.set(entry.id, { ...entry, scopes: [...entry.scopes] });
  }

  for (const [id, override] of Object.entries(config?.providers ?? {})) {
    entries.set(id, applyOverride(id, entries.get(id), override));
  }

  return [...entries.values()].sort((a, b) => a.id.localeCompare(b.id));
}

/**
 * Looks up one service by id.
 *
 * @throws UnknownServiceError if no such service exists
 */
export function getService(
  id: string,
  config?: Pick<TokenlinkConfig, "providers">,
): ProviderEntry {
  const services = listServices(config);
  const entry = services.find((service) => service.id === id);
  if (!entry) {
    throw new UnknownServiceError(
      id,
      services.map((service) => service.id),
    );
  }
  return entry;
}

/**
 * Whether the redirect for this provider must use https.
 * Either the entry or its adapter can demand it.
 */
export function requiresHttps(provider: ProviderEntry): boolean {
  return provider.requiresHttps || getAdapter(provider.adapter).requiresHttps;
}
