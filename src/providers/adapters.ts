/**
 * Per-provider deviations from standard OAuth 2.0.
 *
 * Each adapter describes how one family of providers differs in:
 * - whether the redirect URI must be https, even for localhost
 * - how the client authenticates to the token endpoint
 * - how scopes are named and joined in the authorization URL
 * - the shape of the token response
 * - the headers that authenticate API requests made with the token
 *
 * Adding a provider with a new quirk means adding one entry here.
 *
 * @module providers/adapters
 */

import { z } from "zod";
import type { AdapterId } from "../config/schema.js";
import { ExchangeError } from "../oauth/errors.js";
import { computeExpiresAt, type Token } from "../oauth/token.js";

/**
 * Token endpoint client authentication.
 * - basic: HTTP Basic with client id and secret
 * - body: client_id and client_secret form fields
 */
export type ClientAuthMethod = "basic" | "body";

export interface ScopeParameter {
  /** Query parameter name */
  name: string;
  /** Separator between scopes */
  separator: string;
}

export interface ProviderAdapter {
  readonly id: AdapterId;
  readonly requiresHttps: boolean;
  readonly clientAuth: ClientAuthMethod;
  readonly scopeParam: ScopeParameter;
  /**
   * Turns a successful (HTTP 200) token response body into a Token.
   *
   * @param body - Raw response body
   * @param issuedAt - Unix timestamp (ms) the response was received
   * @throws ExchangeError if the body is unusable or carries no access token
   */
  parseTokenResponse(body: string, issuedAt: number): Token;
  /**
   * Headers that authenticate an API request with an access token.
   */
  apiHeaders(accessToken: string): Record<string, string>;
}

/** API version header Notion requires on every request */
export const NOTION_API_VERSION = "2022-06-28";

function bearerHeaders(accessToken: string): Record<string, string> {
  return { Authorization: `Bearer ${accessToken}` };
}

// Wrong-typed fields are treated as absent rather than failing the parse;
// the access token check below is what decides validity.
const optionalString = z.string().optional().catch(undefined);
const optionalLifetime = z.coerce.number().optional().catch(undefined);

const StandardTokenResponseSchema = z.object({
  access_token: optionalString,
  refresh_token: optionalString,
  token_type: optionalString,
  scope: optionalString,
  expires_in: optionalLifetime,
});

const NotionTokenResponseSchema = StandardTokenResponseSchema.extend({
  workspace_id: optionalString,
  workspace_name: optionalString,
});

const SlackAuthedUserSchema = z.object({
  id: optionalString,
  access_token: optionalString,
  refresh_token: optionalString,
  token_type: optionalString,
  scope: optionalString,
  expires_in: optionalLifetime,
});

const SlackTokenResponseSchema = z.object({
  ok: z.boolean().optional().catch(undefined),
  error: optionalString,
  access_token: optionalString,
  token_type: optionalString,
  scope: optionalString,
  authed_user: SlackAuthedUserSchema.optional().catch(undefined),
  team: z
    .object({ id: optionalString, name: optionalString })
    .optional()
    .catch(undefined),
});

/**
 * Token fields as extracted from a response, before validation.
 */
interface ExtractedToken {
  accessToken: string | undefined;
  refreshToken?: string | undefined;
  tokenType?: string | undefined;
  scope?: string | undefined;
  expiresIn?: number | undefined;
  teamId?: string | undefined;
  user?: string | undefined;
}

function parseJson<T extends z.ZodTypeAny>(schema: T, body: string): z.infer<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExchangeError(
      `failed to parse token response: ${detail}: ${body}`,
      body,
      undefined,
      err,
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ExchangeError(`unexpected token response: ${body}`, body);
  }
  return result.data;
}

/**
 * Validates extracted fields and builds the Token.
 * Rejects responses without a non-empty access token, for every provider.
 */
export function finalizeToken(
  fields: ExtractedToken,
  body: string,
  issuedAt: number,
): Token {
  if (!fields.accessToken) {
    throw new ExchangeError(`no access token in response: ${body}`, body);
  }

  const token: Token = { accessToken: fields.accessToken };
  if (fields.refreshToken) token.refreshToken = fields.refreshToken;
  if (fields.tokenType) token.tokenType = fields.tokenType;
  if (fields.scope) token.scope = fields.scope;
  if (fields.teamId) token.teamId = fields.teamId;
  if (fields.user) token.user = fields.user;

  const expiresAt = computeExpiresAt(issuedAt, fields.expiresIn);
  if (expiresAt !== undefined) token.expiresAt = expiresAt;

  return token;
}

function parseStandardTokenResponse(body: string, issuedAt: number): Token {
  const data = parseJson(StandardTokenResponseSchema, body);
  return finalizeToken(
    {
      accessToken: data.access_token,
      refreshToken: data.refresh_token,
      tokenType: data.token_type,
      scope: data.scope,
      expiresIn: data.expires_in,
    },
    body,
    issuedAt,
  );
}

const standardAdapter: ProviderAdapter = {
  id: "standard",
  requiresHttps: false,
  clientAuth: "body",
  scopeParam: { name: "scope", separator: " " },
  parseTokenResponse: parseStandardTokenResponse,
  apiHeaders: bearerHeaders,
};

/**
 * Linear's API takes the OAuth token without the Bearer prefix.
 */
const linearAdapter: ProviderAdapter = {
  id: "linear",
  requiresHttps: false,
  clientAuth: "body",
  scopeParam: { name: "scope", separator: " " },
  parseTokenResponse: parseStandardTokenResponse,
  apiHeaders: (accessToken) => ({ Authorization: accessToken }),
};

const notionAdapter: ProviderAdapter = {
  id: "notion",
  requiresHttps: false,
  clientAuth: "basic",
  scopeParam: { name: "scope", separator: " " },
  parseTokenResponse(body, issuedAt) {
    const data = parseJson(NotionTokenResponseSchema, body);
    return finalizeToken(
      {
        accessToken: data.access_token,
        refreshToken: data.refresh_token,
        tokenType: data.token_type,
        scope: data.scope,
        expiresIn: data.expires_in,
        teamId: data.workspace_id,
        user: data.workspace_name,
      },
      body,
      issuedAt,
    );
  },
  apiHeaders: (accessToken) => ({
    ...bearerHeaders(accessToken),
    "Notion-Version": NOTION_API_VERSION,
  }),
};

/**
 * Slack issues user tokens under `authed_user` and reports failures with
 * HTTP 200 and `ok: false`, so the flag is checked before anything else.
 */
const slackAdapter: ProviderAdapter = {
  id: "slack",
  requiresHttps: true,
  clientAuth: "body",
  scopeParam: { name: "user_scope", separator: "," },
  parseTokenResponse(body, issuedAt) {
    const data = parseJson(SlackTokenResponseSchema, body);
    if (data.ok === false) {
      throw new ExchangeError(
        `slack auth failed: ${data.error ?? "unknown error"}`,
        body,
      );
    }

    const user = data.authed_user;
    if (user?.access_token) {
      return finalizeToken(
        {
          accessToken: user.access_token,
          refreshToken: user.refresh_token,
          tokenType: user.token_type,
          scope: user.scope,
          expiresIn: user.expires_in,
          teamId: data.team?.id,
          user: data.team?.name,
        },
        body,
        issuedAt,
      );
    }

    // Bot-only installs carry the token at the top level.
    return finalizeToken(
      {
        accessToken: data.access_token,
        tokenType: data.token_type,
        scope: data.scope,
        teamId: data.team?.id,
        user: data.team?.name,
      },
      body,
      issuedAt,
    );
  },
  apiHeaders: bearerHeaders,
};

/** Strategy table keyed by adapter id. */
export const ADAPTERS: Readonly<Record<AdapterId, ProviderAdapter>> = {
  standard: standardAdapter,
  slack: slackAdapter,
  notion: notionAdapter,
  linear: linearAdapter,
};

/**
 * Looks up the adapter for an id.
 */
export function getAdapter(id: AdapterId): ProviderAdapter {
  return ADAPTERS[id];
}
