/**
 * Authorization code → token exchange.
 *
 * @module oauth/token-exchange
 */

import { getAdapter, type ProviderAdapter } from "../providers/adapters.js";
import type { ProviderEntry } from "../providers/registry.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { ExchangeError } from "./errors.js";
import type { ClientCredentials, Token } from "./token.js";

/** Default token endpoint timeout */
export const DEFAULT_EXCHANGE_TIMEOUT_MS = 30_000;

export interface ExchangeCodeOptions {
  provider: ProviderEntry;
  credentials: ClientCredentials;
  code: string;
  /** Must equal the redirect_uri sent in the authorization request */
  redirectUri: string;
  timeoutMs?: number | undefined;
  fetch?: typeof fetch | undefined;
  now?: (() => number) | undefined;
  logger?: Logger | undefined;
}

/**
 * Builds the token request for a provider's client authentication method.
 */
export function buildTokenRequest(
  adapter: ProviderAdapter,
  credentials: ClientCredentials,
  code: string,
  redirectUri: string,
): { headers: Record<string, string>; body: URLSearchParams } {
  const body = new URLSearchParams({
    grant_type: "authorization_code",
    code,
    redirect_uri: redirectUri,
  });
  const headers: Record<string, string> = {
    "Content-Type": "application/x-www-form-urlencoded",
    Accept: "application/json",
  };

  if (adapter.clientAuth === "basic") {
    const basic = Buffer.from(
      `${credentials.clientId}:${credentials.clientSecret}`,
    ).toString("base64");
    headers["Authorization"] = `Basic ${basic}`;
  } else {
    body.set("client_id", credentials.clientId);
    body.set("client_secret", credentials.clientSecret);
  }

  return { headers, body };
}

/**
 * Exchanges an authorization code for a token.
 *
 * @throws ExchangeError on transport failure, timeout, a non-200 status
 *   (message includes the body verbatim) or an unusable response
 */
export async function exchangeCode(options: ExchangeCodeOptions): Promise<Token> {
  const adapter = getAdapter(options.provider.adapter);
  const timeoutMs = options.timeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS;
  const doFetch = options.fetch ?? fetch;
  const now = options.now ?? Date.now;
  const logger = options.logger ?? silentLogger;

  const { headers, body } = buildTokenRequest(
    adapter,
    options.credentials,
    options.code,
    options.redirectUri,
  );

  logger.debug(
    `POST ${options.provider.tokenUrl} (client auth: ${adapter.clientAuth})`,
  );

  let response: Response;
  let text: string;
  try {
    response = await doFetch(options.provider.tokenUrl, {
      method: "POST",
      headers,
      body: body.toString(),
      signal: AbortSignal.timeout(timeoutMs),
    });
    text = await response.text();
  } catch (err) {
    // AbortSignal.timeout rejects with a DOMException named TimeoutError
    if (
      typeof err === "object" &&
      err !== null &&
      "name" in err &&
      err.name === "TimeoutError"
    ) {
      throw new ExchangeError(
        `token request timed out after ${Math.round(timeoutMs / 1000)}s`,
        undefined,
        undefined,
        err,
      );
    }
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExchangeError(
      `token request failed: ${detail}`,
      undefined,
      undefined,
      err,
    );
  }

  logger.debug(`Token endpoint responded with HTTP ${response.status}`);

  if (response.status !== 200) {
    throw new ExchangeError(
      `token exchange failed (HTTP ${response.status}): ${text}`,
      text,
      response.status,
    );
  }

  return adapter.parseTokenResponse(text, now());
}
