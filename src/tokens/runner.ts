/**
 * Runners for the commands that read or remove stored tokens:
 * status, token and logout.
 *
 * @module tokens/runner
 */

import type { CommandContext } from "../cli/context.js";
import { isTokenExpired, type Token } from "../oauth/token.js";
import { getService, listServices } from "../providers/registry.js";
import { SecretStoreError } from "../storage/errors.js";
import { colors } from "../utils/logger.js";

/** Status column values */
export const STATUS_ACTIVE = "✓ active";
export const STATUS_EXPIRED = "✗ expired";
export const STATUS_NOT_CONFIGURED = "✗ not configured";

const COLUMN_GAP = 2;

/**
 * Lays out rows as left-aligned columns separated by two spaces.
 * Trailing whitespace is trimmed from each line.
 */
export function formatTable(rows: readonly (readonly string[])[]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }

  return rows.map((row) =>
    row
      .map((cell, index) =>
        index === row.length - 1
          ? cell
          : cell.padEnd((widths[index] ?? 0) + COLUMN_GAP),
      )
      .join("")
      .trimEnd(),
  );
}

/**
 * Expiry as a calendar date (UTC), or "never".
 */
export function formatExpiry(expiresAt: number | undefined): string {
  return expiresAt === undefined
    ? "never"
    : new Date(expiresAt).toISOString().slice(0, 10);
}

/**
 * One status table row for a service.
 */
export function statusRow(
  serviceId: string,
  token: Token | undefined,
  now: number,
): string[] {
  if (!token) {
    return [serviceId, STATUS_NOT_CONFIGURED, "", ""];
  }
  return [
    serviceId,
    isTokenExpired(token, now) ? STATUS_EXPIRED : STATUS_ACTIVE,
    token.user ?? "-",
    formatExpiry(token.expiresAt),
  ];
}

/**
 * Prints the status table for every known service.
 *
 * @returns Process exit code
 */
export function runStatus(ctx: CommandContext): number {
  const rows: string[][] = [["SERVICE", "STATUS", "USER", "EXPIRES"]];
  const now = ctx.now();

  for (const service of listServices(ctx.config)) {
    let token: Token | undefined;
    try {
      token = ctx.tokens.get(service.id);
    } catch (err) {
      if (!(err instanceof SecretStoreError)) {
        throw err;
      }
      ctx.logger.debug(`Cannot read token for ${service.id}: ${err.message}`);
    }
    rows.push(statusRow(service.id, token, now));
  }

  for (const line of formatTable(rows)) {
    ctx.logger.info(line);
  }
  return 0;
}

/**
 * Writes the access token to stdout, without a trailing newline.
 *
 * @returns Process exit code
 */
export function runToken(serviceId: string, ctx: CommandContext): number {
  const service = getService(serviceId, ctx.config);
  const token = ctx.tokens.get(service.id);
  if (!token) {
    ctx.logger.error(
      `Error: Not authenticated with ${service.id}. Run: tokenlink login ${service.id}`,
    );
    return 1;
  }

  if (isTokenExpired(token, ctx.now())) {
    ctx.logger.warn(
      `Token for ${service.id} expired on ${formatExpiry(token.expiresAt)}. Run: tokenlink login ${service.id}`,
    );
  }
  ctx.write(token.accessToken);
  return 0;
}

/**
 * Deletes the stored token for a service.
 *
 * @returns Process exit code
 */
export function runLogout(serviceId: string, ctx: CommandContext): number {
  const service = getService(serviceId, ctx.config);
  if (ctx.tokens.delete(service.id)) {
    ctx.logger.info(
      `${colors.green}✓${colors.reset} Removed token for ${service.id}`,
    );
  } else {
    ctx.logger.info(`No stored token for ${service.id}`);
  }
  return 0;
}
