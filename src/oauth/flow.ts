/**
 * Loopback authorization-code flow.
 *
 * The flow:
 * 1. Decide the redirect scheme (some providers insist on https)
 * 2. Obtain a localhost certificate if https is needed
 * 3. Generate a state value and start the callback server
 * 4. Open the browser at the authorization URL (URL is printed too)
 * 5. Wait for the first of: callback, server failure, timeout, abort
 * 6. Stop the server, whatever happened
 * 7. Exchange the code for a token
 *
 * @module oauth/flow
 */

import { CertificateError } from "../certs/errors.js";
import { DEFAULT_CALLBACK_PATH, DEFAULT_CALLBACK_PORT } from "../config/schema.js";
import type { ProviderEntry } from "../providers/registry.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import {
  type AuthorizationRequest,
  createAuthorizationRequest,
  redirectSchemeFor,
} from "./authorization-url.js";
import type { BrowserOpener } from "./browser.js";
import {
  type CallbackOutcome,
  type CallbackServerOptions,
  type CertificateSource,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  OAuthCallbackServer,
} from "./callback-server.js";
import {
  CsrfMismatchError,
  FlowCancelledError,
  FlowTimeoutError,
  MissingCodeError,
  OAuthFlowError,
  ProviderDeniedError,
} from "./errors.js";
import { generateState } from "./state.js";
import type { ClientCredentials, Token } from "./token.js";
import { exchangeCode } from "./token-exchange.js";

/** Default wait for the browser redirect */
export const DEFAULT_FLOW_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Flow lifecycle:
 * idle → awaiting_callback → succeeded | failed | timed_out | cancelled
 */
export type FlowState =
  | "idle"
  | "awaiting_callback"
  | "succeeded"
  | "failed"
  | "timed_out"
  | "cancelled";

export interface AuthorizationFlowOptions {
  provider: ProviderEntry;
  credentials: ClientCredentials;
  /** Callback port (default: 8888; 0 picks a free port) */
  port?: number | undefined;
  path?: string | undefined;
  host?: string | undefined;
  timeoutMs?: number | undefined;
  exchangeTimeoutMs?: number | undefined;
  shutdownTimeoutMs?: number | undefined;
  /** Leaf certificate for https redirects */
  certificateSource?: CertificateSource | undefined;
  /** Browser launcher; false only prints the URL */
  openBrowser?: BrowserOpener | false | undefined;
  fetch?: typeof fetch | undefined;
  /** Aborts the wait; the listener is still shut down */
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
  onStateChange?: (state: FlowState) => void;
  /** Called once the listener is up, before the browser opens */
  onListening?: (request: AuthorizationRequest) => void;
  now?: (() => number) | undefined;
  /** Builds the callback server (default: a plain OAuthCallbackServer) */
  createServer?:
    | ((options: CallbackServerOptions) => OAuthCallbackServer)
    | undefined;
}

export interface AuthorizationFlowResult {
  token: Token;
  request: AuthorizationRequest;
}

type WaitResult =
  | { type: "outcome"; outcome: CallbackOutcome }
  | { type: "failure"; error: OAuthFlowError }
  | { type: "timeout" }
  | { type: "cancelled"; reason: unknown };

/**
 * Resolves with whichever source fires first. The others are ignored.
 */
function waitForCallback(
  server: OAuthCallbackServer,
  timeoutMs: number,
  signal: AbortSignal | undefined,
): Promise<WaitResult> {
  return new Promise((resolve) => {
    let done = false;
    const onAbort = (): void => {
      finish({ type: "cancelled", reason: signal?.reason });
    };
    const timer = setTimeout(() => finish({ type: "timeout" }), timeoutMs);

    function finish(result: WaitResult): void {
      if (done) return;
      done = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(result);
    }

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });
    void server.outcome.then((outcome) => finish({ type: "outcome", outcome }));
    void server.failure.then((error) => finish({ type: "failure", error }));
  });
}

function outcomeToError(outcome: Exclude<CallbackOutcome, { type: "code" }>): OAuthFlowError {
  switch (outcome.type) {
    case "provider_error":
      return new ProviderDeniedError(outcome.error, outcome.description);
    case "state_mismatch":
      return new CsrfMismatchError();
    case "missing_code":
      return new MissingCodeError();
  }
}

async function resolveCertificateSource(
  source: CertificateSource | undefined,
  provider: ProviderEntry,
): Promise<CertificateSource> {
  if (!source) {
    throw new CertificateError(
      `${provider.name} requires an https redirect but no certificate is available`,
    );
  }
  if (typeof source !== "function") {
    return source;
  }
  try {
    return await source();
  } catch (err) {
    if (err instanceof CertificateError) {
      throw err;
    }
    throw new CertificateError("Failed to prepare localhost certificate", err);
  }
}

/**
 * Runs one authorization-code flow to completion or failure.
 *
 * @throws BindError if the callback port is unavailable
 * @throws CertificateError if an https redirect is needed and no certificate can be produced
 * @throws ProviderDeniedError, CsrfMismatchError, MissingCodeError for a bad callback
 * @throws FlowTimeoutError if no callback arrives in time
 * @throws FlowCancelledError if the signal aborts
 * @throws ExchangeError if the code cannot be exchanged
 */
export async function runAuthorizationFlow(
  options: AuthorizationFlowOptions,
): Promise<AuthorizationFlowResult> {
  const { provider, credentials } = options;
  const logger = (options.logger ?? silentLogger).child("flow");
  const path = options.path ?? DEFAULT_CALLBACK_PATH;
  const timeoutMs = options.timeoutMs ?? DEFAULT_FLOW_TIMEOUT_MS;
  const shutdownTimeoutMs =
    options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

  let state: FlowState = "idle";
  const transition = (next: FlowState): void => {
    logger.debug(`${state} → ${next}`);
    state = next;
    options.onStateChange?.(next);
  };

  if (options.signal?.aborted) {
    transition("cancelled");
    throw new FlowCancelledError(options.signal.reason);
  }

  const scheme = redirectSchemeFor(provider);
  let certificate: CertificateSource | undefined;
  if (scheme === "https") {
    try {
      certificate = await resolveCertificateSource(
        options.certificateSource,
        provider,
      );
    } catch (err) {
      transition("failed");
      throw err;
    }
  }

  const expectedState = generateState();
  const createServer =
    options.createServer ??
    ((serverOptions: CallbackServerOptions) =>
      new OAuthCallbackServer(serverOptions));
  const server = createServer({
    expectedState,
    port: options.port ?? DEFAULT_CALLBACK_PORT,
    path,
    host: options.host,
    scheme,
    certificate,
    logger: logger.child("callback"),
  });

  try {
    await server.start();
  } catch (err) {
    transition("failed");
    throw err;
  }

  let result: WaitResult;
  let request: AuthorizationRequest;
  try {
    request = createAuthorizationRequest(
      provider,
      credentials.clientId,
      server.port,
      path,
      expectedState,
    );
    transition("awaiting_callback");
    options.onListening?.(request);

    logger.info("Opening browser for authentication...");
    logger.info(`If the browser doesn't open, visit:\n${request.authorizationUrl}\n`);

    if (options.openBrowser) {
      const opened = await options.openBrowser(request.authorizationUrl).catch(
        (err: unknown) => {
          logger.debug(
            `Browser launch threw: ${err instanceof Error ? err.message : String(err)}`,
          );
          return false;
        },
      );
      if (!opened) {
        logger.warn("Could not open the browser automatically. Open the URL above manually.");
      }
    }

    result = await waitForCallback(server, timeoutMs, options.signal);
  } finally {
    await server.stop(shutdownTimeoutMs);
  }

  switch (result.type) {
    case "timeout":
      transition("timed_out");
      throw new FlowTimeoutError(timeoutMs);
    case "cancelled":
      transition("cancelled");
      throw new FlowCancelledError(result.reason);
    case "failure":
      transition("failed");
      throw result.error;
    case "outcome":
      break;
  }

  const outcome = result.outcome;
  if (outcome.type !== "code") {
    transition("failed");
    throw outcomeToError(outcome);
  }

  logger.debug("Authorization code received, exchanging for token");
  try {
    const token = await exchangeCode({
      provider,
      credentials,
      code: outcome.code,
      redirectUri: request.redirectUri,
      timeoutMs: options.exchangeTimeoutMs,
      fetch: options.fetch,
      now: options.now,
      logger,
    });
    transition("succeeded");
    return { token, request };
  } catch (err) {
    transition("failed");
    throw err;
  }
}
