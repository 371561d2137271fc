/**
 * Login command runner.
 *
 * OAuth services go through the loopback authorization-code flow; API-key
 * services prompt for the key. Either way the result is stored as the
 * service's token.
 *
 * @module login/runner
 */

import { ensureTrust } from "../certs/ensure-trust.js";
import type { LoginArgs } from "../cli/index.js";
import type { CommandContext } from "../cli/context.js";
import { OAuthFlowError } from "../oauth/errors.js";
import { runAuthorizationFlow } from "../oauth/flow.js";
import type { Token } from "../oauth/token.js";
import {
  getService,
  type ProviderEntry,
  requiresHttps,
} from "../providers/registry.js";
import { resolveCredentials } from "../storage/credentials.js";
import { colors } from "../utils/logger.js";

export interface LoginOptions extends LoginArgs {
  /** Install the CA without prompting */
  yes: boolean;
  /** Aborts a flow in progress (default: Ctrl+C) */
  signal?: AbortSignal | undefined;
}

const BANNER = "━".repeat(50);

/**
 * Prompts for an API key. Empty keys are rejected.
 */
export async function promptApiKey(
  provider: ProviderEntry,
  ctx: Pick<CommandContext, "prompt" | "logger">,
): Promise<Token> {
  if (provider.setupUrl) {
    ctx.logger.info(`Create an API key at: ${provider.setupUrl}`);
  }
  const apiKey = await ctx.prompt.secret(`Enter your ${provider.name} API key: `);
  if (apiKey === "") {
    throw new Error("API key cannot be empty");
  }
  return { accessToken: apiKey, tokenType: "apikey" };
}

async function prepareHttps(
  provider: ProviderEntry,
  args: LoginOptions,
  ctx: CommandContext,
): Promise<void> {
  const { logger } = ctx;
  logger.info("");
  logger.info(BANNER);
  logger.info("HTTPS callback setup");
  logger.info(BANNER);
  logger.info("");

  const result = await ensureTrust({
    authority: ctx.authority,
    trustStore: ctx.trustStore,
    logger,
    confirm: (question) => ctx.prompt.confirm(question),
    assumeYes: args.yes,
    reason:
      `${provider.name} requires HTTPS for OAuth callbacks. To avoid browser\n` +
      "security warnings, tokenlink installs a local certificate authority\n" +
      "into your system's trust store.",
  });

  if (result.status === "declined" || result.status === "untrusted") {
    logger.info("Continuing with an untrusted certificate.");
  }
  logger.info(BANNER);
  logger.info("");
}

/**
 * Wires Ctrl+C to an AbortSignal for the duration of the flow.
 */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort(new Error("interrupted"));
  };
  process.once("SIGINT", onInterrupt);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener("SIGINT", onInterrupt);
    },
  };
}

async function oauthLogin(
  provider: ProviderEntry,
  args: LoginOptions,
  ctx: CommandContext,
): Promise<Token> {
  const { config, logger } = ctx;
  const credentials = resolveCredentials(
    provider.id,
    ctx.credentials,
    ctx.env,
    provider.setupUrl,
  );

  const https = requiresHttps(provider);
  if (https) {
    await prepareHttps(provider, args, ctx);
  }

  const shouldOpenBrowser = args.openBrowser ?? config.oauth.openBrowser;
  const interrupt = args.signal ? undefined : interruptSignal();
  try {
    const { token } = await runAuthorizationFlow({
      provider,
      credentials,
      port: args.port ?? config.oauth.callbackPort,
      path: config.oauth.callbackPath,
      timeoutMs: config.oauth.timeoutMs,
      exchangeTimeoutMs: config.oauth.exchangeTimeoutMs,
      shutdownTimeoutMs: config.oauth.shutdownTimeoutMs,
      certificateSource: https
        ? () => ctx.authority.issueLeafCertificate()
        : undefined,
      openBrowser: shouldOpenBrowser ? ctx.openBrowser : false,
      fetch: ctx.fetch,
      signal: args.signal ?? interrupt?.signal,
      logger,
      now: ctx.now,
    });
    return token;
  } finally {
    interrupt?.dispose();
  }
}

/**
 * Runs the login command for one service.
 *
 * @returns Process exit code
 */
export async function runLogin(
  serviceId: string,
  args: LoginOptions,
  ctx: CommandContext,
): Promise<number> {
  const { logger } = ctx;
  const provider = getService(serviceId, ctx.config);

  logger.info(`Authenticating with ${provider.name}...`);

  let token: Token;
  try {
    token =
      provider.authType === "apikey"
        ? await promptApiKey(provider, ctx)
        : await oauthLogin(provider, args, ctx);
  } catch (err) {
    if (!(err instanceof OAuthFlowError)) {
      throw err;
    }
    logger.error(`Error: Authentication failed: ${err.message}`);
    return 1;
  }

  ctx.tokens.set(provider.id, token);

  const who = token.user ? ` (${token.user})` : "";
  logger.info(
    `${colors.green}✓${colors.reset} Successfully authenticated with ${provider.name}${who}`,
  );
  return 0;
}
