/**
 * Authorization request construction.
 *
 * @module oauth/authorization-url
 */

import { getAdapter } from "../providers/adapters.js";
import { type ProviderEntry, requiresHttps } from "../providers/registry.js";
import type { CallbackScheme } from "./callback-server.js";

/**
 * Immutable description of one authorization round-trip.
 */
export interface AuthorizationRequest {
  readonly state: string;
  readonly authorizationUrl: string;
  readonly redirectUri: string;
  readonly expectedScheme: CallbackScheme;
}

/**
 * Scheme the provider's redirect URI must use.
 */
export function redirectSchemeFor(provider: ProviderEntry): CallbackScheme {
  return requiresHttps(provider) ? "https" : "http";
}

/**
 * Loopback redirect URI, e.g. `https://localhost:8888/callback`.
 */
export function buildRedirectUri(
  scheme: CallbackScheme,
  port: number,
  path: string,
): string {
  return `${scheme}://localhost:${port}${path}`;
}

/**
 * Builds the URL the user's browser is sent to.
 *
 * Query parameters already present on the provider's authorization URL are
 * kept; the OAuth parameters are set (replacing any existing value).
 */
export function buildAuthorizationUrl(
  provider: ProviderEntry,
  clientId: string,
  redirectUri: string,
  state: string,
): string {
  const url = new URL(provider.authUrl);
  url.searchParams.set("client_id", clientId);
  url.searchParams.set("redirect_uri", redirectUri);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("state", state);

  if (provider.scopes.length > 0) {
    const { name, separator } = getAdapter(provider.adapter).scopeParam;
    url.searchParams.set(name, provider.scopes.join(separator));
  }

  return url.toString();
}

/**
 * Creates the frozen request for one flow.
 */
export function createAuthorizationRequest(
  provider: ProviderEntry,
  clientId: string,
  port: number,
  path: string,
  state: string,
): AuthorizationRequest {
  const expectedScheme = redirectSchemeFor(provider);
  const redirectUri = buildRedirectUri(expectedScheme, port, path);

  return Object.freeze({
    state,
    redirectUri,
    expectedScheme,
    authorizationUrl: buildAuthorizationUrl(provider, clientId, redirectUri, state),
  });
}
