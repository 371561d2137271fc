/**
 * OAuth client credentials: where they come from.
 *
 * Lookup order:
 * 1. TOKENLINK_<SERVICE>_CLIENT_ID / TOKENLINK_<SERVICE>_CLIENT_SECRET
 * 2. `<config dir>/credentials/<service>.json`, written by `tokenlink setup`
 *
 * @module storage/credentials
 */

import { z } from "zod";
import { getCredentialsDir } from "../config/paths.js";
import type { ClientCredentials } from "../oauth/token.js";
import { SecretStoreUnavailableError } from "./errors.js";
import { JsonFileStore } from "./json-store.js";

const StoredCredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
});

/**
 * Thrown when a service has neither environment nor stored credentials.
 */
export class CredentialsNotFoundError extends Error {
  constructor(
    public readonly serviceId: string,
    setupUrl?: string,
  ) {
    super(
      `No OAuth credentials found for ${serviceId}.\n\n` +
        `Option 1: Run setup\n  tokenlink setup ${serviceId}\n\n` +
        `Option 2: Use environment variables\n${envInstructions(serviceId)}` +
        (setupUrl ? `\n\nTo create an OAuth app, visit: ${setupUrl}` : ""),
    );
    this.name = "CredentialsNotFoundError";
  }
}

/**
 * Environment variable names for a service's client credentials.
 */
export function credentialEnvNames(serviceId: string): {
  clientId: string;
  clientSecret: string;
} {
  const prefix = `TOKENLINK_${serviceId.toUpperCase().replace(/[^A-Z0-9]/g, "_")}`;
  return {
    clientId: `${prefix}_CLIENT_ID`,
    clientSecret: `${prefix}_CLIENT_SECRET`,
  };
}

function envInstructions(serviceId: string): string {
  const names = credentialEnvNames(serviceId);
  return `  export ${names.clientId}=<client id>\n  export ${names.clientSecret}=<client secret>`;
}

/**
 * Client credentials keyed by service id.
 */
export class CredentialStore {
  private readonly store: JsonFileStore<ClientCredentials>;

  /**
   * @param baseDir - Directory for credential files (default: <config dir>/credentials)
   */
  constructor(baseDir: string = getCredentialsDir()) {
    this.store = new JsonFileStore(baseDir, StoredCredentialsSchema, "credentials");
  }

  get(serviceId: string): ClientCredentials | undefined {
    return this.store.read(serviceId);
  }

  set(serviceId: string, credentials: ClientCredentials): void {
    this.store.write(serviceId, {
      clientId: credentials.clientId,
      clientSecret: credentials.clientSecret,
    });
  }

  delete(serviceId: string): boolean {
    return this.store.remove(serviceId);
  }
}

/**
 * Finds client credentials for a service. Environment variables win.
 *
 * @throws SecretStoreUnavailableError (with env-var help) if the store cannot be read
 * @throws CredentialsNotFoundError if no credentials exist
 */
export function resolveCredentials(
  serviceId: string,
  store: CredentialStore,
  env: NodeJS.ProcessEnv = process.env,
  setupUrl?: string,
): ClientCredentials {
  const names = credentialEnvNames(serviceId);
  const clientId = env[names.clientId];
  const clientSecret = env[names.clientSecret];
  if (clientId && clientSecret) {
    return { clientId, clientSecret };
  }

  let stored: ClientCredentials | undefined;
  try {
    stored = store.get(serviceId);
  } catch (err) {
    if (err instanceof SecretStoreUnavailableError) {
      throw new SecretStoreUnavailableError(
        err.path,
        err.cause,
        `Set the credentials in the environment instead:\n${envInstructions(serviceId)}`,
      );
    }
    throw err;
  }

  if (!stored) {
    throw new CredentialsNotFoundError(serviceId, setupUrl);
  }
  return stored;
}
