/**
 * Setup command runner.
 *
 * Walks the user through registering an OAuth app with a provider and
 * stores the resulting client credentials.
 *
 * @module setup/runner
 */

import type { SetupArgs } from "../cli/index.js";
import type { CommandContext } from "../cli/context.js";
import { buildRedirectUri, redirectSchemeFor } from "../oauth/authorization-url.js";
import { getService } from "../providers/registry.js";
import { credentialEnvNames } from "../storage/credentials.js";
import { colors } from "../utils/logger.js";

const RULE = "─".repeat(50);

/**
 * Runs the setup command for one service.
 *
 * @returns Process exit code
 */
export async function runSetup(
  serviceId: string,
  args: SetupArgs,
  ctx: CommandContext,
): Promise<number> {
  const { logger, config } = ctx;
  const provider = getService(serviceId, config);

  if (provider.authType === "apikey") {
    logger.info(
      `${provider.name} uses an API key, not an OAuth app. Run 'tokenlink login ${provider.id}' to enter it.`,
    );
    return 0;
  }

  const envNames = credentialEnvNames(provider.id);
  if (ctx.env[envNames.clientId]) {
    logger.info(`Note: ${envNames.clientId} is set for ${provider.name}.`);
    logger.info("Environment variables take precedence over stored credentials.\n");
  }

  logger.info(`Setting up ${provider.name} OAuth credentials`);
  logger.info(RULE);
  logger.info("");

  if (provider.setupUrl) {
    logger.info(`Create an OAuth app at: ${provider.setupUrl}\n`);
    if (args.open && !(await ctx.openBrowser(provider.setupUrl))) {
      logger.warn("Could not open the browser automatically.");
    }
  }

  if (provider.setupInstructions) {
    logger.info(provider.setupInstructions);
    logger.info("");
  }

  const redirectUri = buildRedirectUri(
    redirectSchemeFor(provider),
    config.oauth.callbackPort,
    config.oauth.callbackPath,
  );
  logger.info(`Redirect URI: ${redirectUri}`);
  logger.info(RULE);

  const clientId = await ctx.prompt.ask("Client ID: ");
  if (clientId === "") {
    logger.error("Error: Client ID cannot be empty");
    return 1;
  }
  const clientSecret = await ctx.prompt.secret("Client Secret: ");
  if (clientSecret === "") {
    logger.error("Error: Client secret cannot be empty");
    return 1;
  }

  ctx.credentials.set(provider.id, { clientId, clientSecret });

  logger.info("");
  logger.info(
    `${colors.green}✓${colors.reset} Credentials saved for ${provider.name}`,
  );
  logger.info(`  Run 'tokenlink login ${provider.id}' to authenticate.`);
  return 0;
}
