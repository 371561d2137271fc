/**
 * File-based token storage.
 *
 * Tokens survive process restarts as one JSON file per service under
 * `<config dir>/tokens/`. tokenlink never refreshes them; an expired
 * token stays on disk until the next login or logout.
 *
 * @module storage/token-storage
 */

import { z } from "zod";
import { getTokensDir } from "../config/paths.js";
import type { Token } from "../oauth/token.js";
import { JsonFileStore } from "./json-store.js";

const StoredTokenSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().optional(),
  tokenType: z.string().optional(),
  scope: z.string().optional(),
  expiresAt: z.number().optional(),
  teamId: z.string().optional(),
  user: z.string().optional(),
  /** When the token was written */
  updatedAt: z.number().optional(),
});

type StoredToken = z.infer<typeof StoredTokenSchema>;

function toToken(stored: StoredToken): Token {
  const token: Token = { accessToken: stored.accessToken };
  if (stored.refreshToken !== undefined) token.refreshToken = stored.refreshToken;
  if (stored.tokenType !== undefined) token.tokenType = stored.tokenType;
  if (stored.scope !== undefined) token.scope = stored.scope;
  if (stored.expiresAt !== undefined) token.expiresAt = stored.expiresAt;
  if (stored.teamId !== undefined) token.teamId = stored.teamId;
  if (stored.user !== undefined) token.user = stored.user;
  return token;
}

/**
 * Access tokens keyed by service id.
 */
export class TokenStorage {
  private readonly store: JsonFileStore<StoredToken>;

  /**
   * @param baseDir - Directory for token files (default: <config dir>/tokens)
   * @param now - Clock for the updatedAt stamp
   */
  constructor(
    baseDir: string = getTokensDir(),
    private readonly now: () => number = Date.now,
  ) {
    this.store = new JsonFileStore(baseDir, StoredTokenSchema, "token");
  }

  get baseDir(): string {
    return this.store.baseDir;
  }

  /**
   * @returns The stored token, or undefined if the service has none
   * @throws SecretStoreUnavailableError if the store cannot be read
   * @throws SecretStoreError if the stored file is malformed
   */
  get(serviceId: string): Token | undefined {
    const stored = this.store.read(serviceId);
    return stored ? toToken(stored) : undefined;
  }

  set(serviceId: string, token: Token): void {
    this.store.write(serviceId, { ...token, updatedAt: this.now() });
  }

  /**
   * @returns true if a token was removed
   */
  delete(serviceId: string): boolean {
    return this.store.remove(serviceId);
  }
}
