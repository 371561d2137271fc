/**
 * Access token produced by a completed flow.
 *
 * @module oauth/token
 */

/**
 * Token returned to the caller. tokenlink stores it but never refreshes it.
 */
export interface Token {
  /** Bearer credential; never empty */
  accessToken: string;
  refreshToken?: string;
  tokenType?: string;
  scope?: string;
  /** Unix timestamp (ms) when the token expires; absent means never */
  expiresAt?: number;
  /** Workspace or team the token is bound to (Slack team, Notion workspace) */
  teamId?: string;
  /** Display name of the authorizing user or workspace */
  user?: string;
}

/**
 * OAuth client credentials registered with a provider.
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Whether the token is past its expiry. Tokens without one never expire.
 */
export function isTokenExpired(token: Token, now: number = Date.now()): boolean {
  return token.expiresAt !== undefined && now >= token.expiresAt;
}

/**
 * Computes an absolute expiry from a relative lifetime in seconds.
 * Missing, zero or negative lifetimes mean the token does not expire.
 */
export function computeExpiresAt(
  issuedAt: number,
  expiresInSeconds: number | undefined,
): number | undefined {
  if (expiresInSeconds === undefined || !(expiresInSeconds > 0)) {
    return undefined;
  }
  return issuedAt + expiresInSeconds * 1000;
}
