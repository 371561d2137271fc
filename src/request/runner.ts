/**
 * Request command runner.
 *
 * Sends one HTTP request to a service's API with the stored token attached
 * the way that service expects it. JSON responses are pretty-printed.
 *
 * @module request/runner
 */

import type { RequestArgs } from "../cli/index.js";
import type { CommandContext } from "../cli/context.js";
import { isTokenExpired } from "../oauth/token.js";
import { getAdapter } from "../providers/adapters.js";
import { getService } from "../providers/registry.js";
import { formatExpiry } from "../tokens/runner.js";

export interface ApiRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body: string | undefined;
}

/**
 * Pretty-prints a JSON body; anything else is returned as is.
 */
export function formatResponseBody(text: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  return JSON.stringify(parsed, null, 2);
}

/**
 * Joins the API base URL and a request path.
 */
export function buildApiUrl(apiBaseUrl: string, path: string): string {
  return `${apiBaseUrl}${path}`;
}

/**
 * Runs the request command.
 *
 * @returns Process exit code (1 when the API answers with status >= 400)
 */
export async function runRequest(
  serviceId: string,
  args: RequestArgs,
  ctx: CommandContext,
): Promise<number> {
  const { logger } = ctx;
  const service = getService(serviceId, ctx.config);

  if (!args.method || !args.path) {
    logger.error("Error: request command requires a method and a path.");
    logger.error(`Usage: tokenlink request ${service.id} <method> <path>`);
    return 1;
  }

  if (!service.apiBaseUrl) {
    logger.error(
      `Error: No API base URL configured for ${service.id}. Set apiBaseUrl under [providers.${service.id}].`,
    );
    return 1;
  }

  const token = ctx.tokens.get(service.id);
  if (!token) {
    logger.error(
      `Error: Not authenticated with ${service.id}. Run: tokenlink login ${service.id}`,
    );
    return 1;
  }
  if (isTokenExpired(token, ctx.now())) {
    logger.warn(
      `Token for ${service.id} expired on ${formatExpiry(token.expiresAt)}. Run: tokenlink login ${service.id}`,
    );
  }

  const request: ApiRequest = {
    method: args.method.toUpperCase(),
    url: buildApiUrl(service.apiBaseUrl, args.path),
    headers: getAdapter(service.adapter).apiHeaders(token.accessToken),
    body: args.data,
  };
  if (request.body !== undefined) {
    request.headers["Content-Type"] = "application/json";
  }

  logger.debug(`Request: ${request.method} ${request.url}`);

  let response: Response;
  let text: string;
  try {
    response = await ctx.fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body ?? null,
    });
    text = await response.text();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new Error(`request failed: ${detail}`, { cause: err });
  }

  logger.debug(`Response: HTTP ${response.status}`);
  ctx.write(`${formatResponseBody(text)}\n`);

  if (response.status >= 400) {
    logger.error(`Error: request returned status ${response.status}`);
    return 1;
  }
  return 0;
}
