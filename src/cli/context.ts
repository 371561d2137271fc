/**
 * Everything a command runner needs, passed explicitly.
 *
 * @module cli/context
 */

import { CertificateAuthorityManager } from "../certs/authority.js";
import { TrustStore } from "../certs/trust.js";
import type { TokenlinkConfig } from "../config/schema.js";
import { type BrowserOpener, openBrowser } from "../oauth/browser.js";
import { CredentialStore } from "../storage/credentials.js";
import { TokenStorage } from "../storage/token-storage.js";
import type { Logger } from "../utils/logger.js";
import { type Prompter, terminalPrompter } from "./prompt.js";

/**
 * Process-wide settings resolved once at startup.
 */
export interface RuntimeContext {
  config: TokenlinkConfig;
  version: string;
  logger: Logger;
}

/**
 * Runtime context plus the collaborators a command talks to.
 */
export interface CommandContext extends RuntimeContext {
  tokens: TokenStorage;
  credentials: CredentialStore;
  authority: CertificateAuthorityManager;
  trustStore: TrustStore;
  prompt: Prompter;
  openBrowser: BrowserOpener;
  fetch: typeof fetch;
  env: NodeJS.ProcessEnv;
  /** Raw stdout writer (no trailing newline added) */
  write: (text: string) => void;
  now: () => number;
}

/**
 * Wires the default collaborators for a real run.
 */
export function createCommandContext(runtime: RuntimeContext): CommandContext {
  return {
    ...runtime,
    tokens: new TokenStorage(),
    credentials: new CredentialStore(),
    authority: new CertificateAuthorityManager(),
    trustStore: new TrustStore({ logger: runtime.logger.child("certs") }),
    prompt: terminalPrompter,
    openBrowser,
    fetch: globalThis.fetch,
    env: process.env,
    write: (text) => {
      process.stdout.write(text);
    },
    now: Date.now,
  };
}
