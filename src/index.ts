/**
 * tokenlink - Main entry point.
 *
 * tokenlink obtains delegated access tokens from third-party services for
 * local command-line tools. It supports:
 *
 * - OAuth 2.0 authorization-code flow with a loopback callback listener
 * - HTTPS callbacks backed by a locally trusted certificate authority
 * - API-key services through a prompt
 * - File-based token and client credential storage
 *
 * @module tokenlink
 */

import { type CliArgs, parseArgs, printHelp, requiresService } from "./cli/index.js";
import {
  type CommandContext,
  createCommandContext,
  type RuntimeContext,
} from "./cli/context.js";
import { ConfigError, loadConfig } from "./config/index.js";
import { runInit } from "./init/runner.js";
import { runLogin } from "./login/runner.js";
import { listServices } from "./providers/registry.js";
import { runRequest } from "./request/runner.js";
import { runSetup } from "./setup/runner.js";
import { runLogout, runStatus, runToken } from "./tokens/runner.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { resolveVersion } from "./version.js";

export * from "./oauth/index.js";
export * from "./storage/index.js";
export {
  BUILTIN_PROVIDERS,
  getService,
  listServices,
  type ProviderEntry,
  UnknownServiceError,
} from "./providers/registry.js";

export interface MainOptions {
  /** Builds the command context (default: real stores, terminal prompts) */
  createContext?: (runtime: RuntimeContext) => CommandContext;
  version?: string;
}

async function dispatch(args: CliArgs, ctx: CommandContext): Promise<number> {
  const service = args.service ?? "";
  switch (args.command) {
    case "init":
      return runInit({ ...args.init, yes: args.yes }, ctx);
    case "login":
      return runLogin(service, { ...args.login, yes: args.yes }, ctx);
    case "setup":
      return runSetup(service, args.setup, ctx);
    case "logout":
      return runLogout(service, ctx);
    case "status":
      return runStatus(ctx);
    case "token":
      return runToken(service, ctx);
    case "request":
      return runRequest(service, args.request, ctx);
    case undefined:
      printHelp(listServices(ctx.config).map((entry) => entry.id));
      return 0;
  }
}

/**
 * Runs a command, turning a thrown error into a message and exit code 1.
 */
async function runCommand(
  logger: Logger,
  run: () => Promise<number>,
): Promise<number> {
  try {
    return await run();
  } catch (err) {
    if (!(err instanceof Error)) {
      throw err;
    }
    logger.error(`Error: ${err.message}`);
    logger.debug(err.stack ?? "");
    return 1;
  }
}

/**
 * Main entry point for the tokenlink CLI.
 * Parses arguments and dispatches to the command runner.
 *
 * @returns Process exit code
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  options: MainOptions = {},
): Promise<number> {
  const args = parseArgs(argv);
  const version = options.version ?? resolveVersion();

  if (args.help) {
    printHelp();
    return 0;
  }

  if (args.version) {
    console.log(`tokenlink v${version}`);
    return 0;
  }

  const bootLogger = createLogger({ debug: args.debug });
  if (args.errors.length > 0) {
    for (const message of args.errors) {
      bootLogger.error(`Error: ${message}`);
    }
    bootLogger.error("Run 'tokenlink --help' for usage.");
    return 1;
  }

  if (args.command && requiresService(args.command) && !args.service) {
    bootLogger.error(`Error: ${args.command} command requires a service name.`);
    const operands =
      args.command === "request" ? "<service> <method> <path>" : "<service>";
    bootLogger.error(`Usage: tokenlink ${args.command} ${operands}`);
    return 1;
  }

  let runtime: RuntimeContext;
  try {
    const loaded = loadConfig();
    const logger = createLogger({ debug: args.debug || loaded.config.debug });
    logger.debug(
      loaded.exists
        ? `Loaded configuration from ${loaded.path}`
        : `No configuration file at ${loaded.path}, using defaults`,
    );
    runtime = { config: loaded.config, version, logger };
  } catch (err) {
    if (!(err instanceof ConfigError)) {
      throw err;
    }
    bootLogger.error(`Error loading configuration: ${err.message}`);
    return 1;
  }

  const ctx = (options.createContext ?? createCommandContext)(runtime);
  return runCommand(runtime.logger, () => dispatch(args, ctx));
}
