/**
 * Command-line interface argument parsing.
 *
 * This module handles parsing command-line arguments for the tokenlink CLI.
 * Supports CA setup, login, credential setup, logout, status, token output
 * and authenticated API requests.
 *
 * @module cli
 */

import { MAX_CALLBACK_PORT, MIN_CALLBACK_PORT } from "../config/schema.js";

/** Subcommands tokenlink understands */
export type CommandName =
  | "init"
  | "login"
  | "setup"
  | "logout"
  | "status"
  | "token"
  | "request";

const COMMANDS: readonly CommandName[] = [
  "init",
  "login",
  "setup",
  "logout",
  "status",
  "token",
  "request",
];

/** Commands that take a <service> argument */
const SERVICE_COMMANDS: ReadonlySet<CommandName> = new Set([
  "login",
  "setup",
  "logout",
  "token",
  "request",
]);

/**
 * Parsed command-line arguments.
 */
export interface CliArgs {
  /** Subcommand, undefined when none was given */
  command: CommandName | undefined;
  /** Service id for login, setup, logout and token */
  service: string | undefined;
  /** Whether --help was requested */
  help: boolean;
  /** Whether --version was requested */
  version: boolean;
  /** Print diagnostics to stderr */
  debug: boolean;
  /** Answer yes to confirmation prompts */
  yes: boolean;
  /** Init-specific options */
  init: InitArgs;
  /** Login-specific options */
  login: LoginArgs;
  /** Setup-specific options */
  setup: SetupArgs;
  /** Request-specific arguments */
  request: RequestArgs;
  /** Problems found while parsing (unknown flags, bad values) */
  errors: string[];
}

/**
 * Init-specific command-line arguments.
 */
export interface InitArgs {
  /** Regenerate the CA even if one exists */
  force: boolean;
  /** Remove the CA from the system trust store instead */
  uninstall: boolean;
}

/**
 * Login-specific command-line arguments.
 */
export interface LoginArgs {
  /** Callback port override */
  port: number | undefined;
  /** Launch the browser automatically (default: from config) */
  openBrowser: boolean | undefined;
}

/**
 * Setup-specific command-line arguments.
 */
export interface SetupArgs {
  /** Open the provider's app registration page in the browser */
  open: boolean;
}

/**
 * Request-specific command-line arguments.
 */
export interface RequestArgs {
  /** HTTP method, as typed */
  method: string | undefined;
  /** Path appended to the service's API base URL */
  path: string | undefined;
  /** JSON request body */
  data: string | undefined;
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function parsePort(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const port = Number.parseInt(value, 10);
  return port >= MIN_CALLBACK_PORT && port <= MAX_CALLBACK_PORT
    ? port
    : undefined;
}

/**
 * Stores a positional argument that follows the command.
 *
 * @returns false if the command takes no further positionals
 */
function takePositional(result: CliArgs, arg: string): boolean {
  const command = result.command;
  if (command === undefined) {
    return false;
  }
  if (SERVICE_COMMANDS.has(command) && result.service === undefined) {
    result.service = arg;
    return true;
  }
  if (command === "request") {
    if (result.request.method === undefined) {
      result.request.method = arg;
      return true;
    }
    if (result.request.path === undefined) {
      result.request.path = arg;
      return true;
    }
  }
  return false;
}

/**
 * Parses command-line arguments into structured CliArgs.
 *
 * @param args - Array of command-line arguments (without node/script)
 * @returns Parsed CLI arguments
 *
 * @example
 * ```ts
 * const args = parseArgs(process.argv.slice(2));
 * if (args.command === "login") {
 *   // run the OAuth flow for args.service
 * }
 * ```
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    command: undefined,
    service: undefined,
    help: false,
    version: false,
    debug: false,
    yes: false,
    init: {
      force: false,
      uninstall: false,
    },
    login: {
      port: undefined,
      openBrowser: undefined,
    },
    setup: {
      open: false,
    },
    request: {
      method: undefined,
      path: undefined,
      data: undefined,
    },
    errors: [],
  };
  let commandSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Get value for --flag=value format
    const eqIndex = arg.indexOf("=");
    const argName = eqIndex > 0 ? arg.slice(0, eqIndex) : arg;
    const argValue = eqIndex > 0 ? arg.slice(eqIndex + 1) : undefined;

    switch (argName) {
      case "--debug":
        result.debug = true;
        break;

      case "--yes":
      case "-y":
        result.yes = true;
        break;

      case "--force":
        result.init.force = true;
        break;

      case "--uninstall":
        result.init.uninstall = true;
        break;

      case "--open":
      case "-o":
        result.setup.open = true;
        break;

      case "--no-browser":
        result.login.openBrowser = false;
        break;

      case "--port": {
        const value = argValue ?? args[++i];
        const port = parsePort(value);
        if (port === undefined) {
          result.errors.push(`Invalid port: ${value ?? "(missing)"}`);
        } else {
          result.login.port = port;
        }
        break;
      }

      case "--data":
      case "-d": {
        const value = argValue ?? args[++i];
        if (value === undefined) {
          result.errors.push(`Missing value for ${argName}`);
        } else {
          result.request.data = value;
        }
        break;
      }

      case "--help":
      case "-h":
        result.help = true;
        break;

      case "--version":
      case "-v":
        result.version = true;
        break;

      default:
        if (arg.startsWith("-")) {
          result.errors.push(`Unknown option: ${arg}`);
        } else if (!commandSeen) {
          commandSeen = true;
          if (isCommandName(arg)) {
            result.command = arg;
          } else {
            result.errors.push(`Unknown command: ${arg}`);
          }
        } else if (!takePositional(result, arg)) {
          result.errors.push(`Unexpected argument: ${arg}`);
        }
    }
  }

  return result;
}

/**
 * Whether a command needs a <service> argument.
 */
export function requiresService(command: CommandName): boolean {
  return SERVICE_COMMANDS.has(command);
}

/**
 * Prints the help message to stdout.
 * Shows available commands, options, and examples.
 */
export function printHelp(services: readonly string[] = []): void {
  console.log(`
tokenlink - Local OAuth tokens for command-line tools

Usage:
  tokenlink init [options]        Create and trust the local certificate authority
  tokenlink login <service>       Sign in to a service and store the token
  tokenlink setup <service>       Store OAuth client credentials for a service
  tokenlink logout <service>      Remove the stored token for a service
  tokenlink status                Show login status for every service
  tokenlink token <service>       Print the stored access token
  tokenlink request <service> <method> <path>
                                  Send an authenticated API request
  tokenlink --help                Show this help message
  tokenlink --version             Show version information

Global Options:
  --debug                         Print diagnostic output to stderr
  --help, -h                      Show help
  --version, -v                   Show version

Init Options:
  --force                         Regenerate the certificate authority
  --uninstall                     Remove the certificate authority from the trust store
  --yes, -y                       Install without prompting

Login Options:
  --port=<port>                   Callback port, ${MIN_CALLBACK_PORT}-${MAX_CALLBACK_PORT} (default: 8888)
  --no-browser                    Print the authorization URL without opening a browser
  --yes, -y                       Install the certificate authority without prompting

Setup Options:
  --open, -o                      Open the app registration page in the browser

Request Options:
  --data=<json>, -d <json>        Request body (sent as application/json)
${services.length > 0 ? `\nServices:\n  ${services.join(", ")}\n` : ""}
Examples:
  tokenlink init                  Set up HTTPS callbacks (needed for Slack)
  tokenlink setup linear          Enter the Linear OAuth app credentials
  tokenlink login linear          Sign in to Linear in the browser
  tokenlink token linear          Print the token, e.g. for an Authorization header
  tokenlink request notion POST /v1/search --data '{"query": "notes"}'
`);
}
