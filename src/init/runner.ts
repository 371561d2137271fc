/**
 * Init command runner.
 *
 * Creates the local certificate authority and installs it into the system
 * trust store, so https callbacks on localhost load without warnings.
 *
 * @module init/runner
 */

import { dirname } from "node:path";
import { ensureTrust } from "../certs/ensure-trust.js";
import { TrustInstallError } from "../certs/errors.js";
import type { InitArgs } from "../cli/index.js";
import type { CommandContext } from "../cli/context.js";
import { colors } from "../utils/logger.js";

export interface InitOptions extends InitArgs {
  /** Skip the confirmation prompt */
  yes: boolean;
}

/**
 * Runs the init command.
 *
 * @returns Process exit code
 */
export async function runInit(
  args: InitOptions,
  ctx: CommandContext,
): Promise<number> {
  const { logger } = ctx;

  if (args.uninstall) {
    logger.info("Removing certificate authority from system trust store...");
    try {
      await ctx.trustStore.uninstallAuthority();
    } catch (err) {
      if (!(err instanceof TrustInstallError)) {
        throw err;
      }
      logger.error(`Error: ${err.message}`);
      return 1;
    }
    logger.info(`${colors.green}✓${colors.reset} Certificate authority removed`);
    logger.info(
      `${colors.dim}The CA files in ${dirname(ctx.authority.certificatePath)} were kept; run 'tokenlink init --force' to replace them.${colors.reset}`,
    );
    return 0;
  }

  const result = await ensureTrust({
    authority: ctx.authority,
    trustStore: ctx.trustStore,
    logger,
    confirm: (question) => ctx.prompt.confirm(question),
    force: args.force,
    assumeYes: args.yes,
    reason:
      "tokenlink uses a local certificate authority for https callbacks on localhost.\n" +
      "Some services (Slack) refuse plain http redirect URLs.",
  });

  switch (result.status) {
    case "trusted":
      logger.info(
        `${colors.green}✓${colors.reset} Certificate authority already installed (${result.certificatePath})`,
      );
      logger.info("Use --force to regenerate it.");
      break;
    case "installed":
      logger.info("");
      logger.info("Setup complete. Next steps:");
      logger.info("  1. Store OAuth app credentials: tokenlink setup <service>");
      logger.info("  2. Sign in: tokenlink login <service>");
      break;
    case "declined":
    case "untrusted":
      break;
  }
  return 0;
}
