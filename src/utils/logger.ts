/**
 * Console logger with an explicit debug switch.
 *
 * Progress meant for the user goes to stdout; warnings, errors and debug
 * diagnostics go to stderr so piping `tokenlink token <service>` stays clean.
 *
 * @module utils/logger
 */

/** ANSI color codes */
export const colors = {
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  dim: "\x1b[2m",
  reset: "\x1b[0m",
} as const;

export interface Logger {
  readonly debugEnabled: boolean;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(prefix: string): Logger;
}

export interface LoggerOptions {
  debug?: boolean;
  prefix?: string;
  /** Sink for stdout lines (default: console.log) */
  out?: (line: string) => void;
  /** Sink for stderr lines (default: console.error) */
  err?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((line: string) => console.error(line));
  const tag = options.prefix ? `[${options.prefix}] ` : "";

  return {
    debugEnabled,
    debug(message) {
      if (debugEnabled) {
        err(`[DEBUG] ${tag}${message}`);
      }
    },
    info(message) {
      out(message);
    },
    warn(message) {
      err(`${colors.yellow}Warning:${colors.reset} ${tag}${message}`);
    },
    error(message) {
      err(`${tag}${message}`);
    },
    child(prefix) {
      return createLogger({
        debug: debugEnabled,
        prefix: options.prefix ? `${options.prefix}:${prefix}` : prefix,
        out,
        err,
      });
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({
  out: () => {},
  err: () => {},
});
