/**
 * OAuth callback server for handling authorization redirects.
 *
 * One implementation serves both plain HTTP and HTTPS: the scheme and an
 * optional certificate source are parameters. The server accepts exactly
 * one outcome; the browser always gets an HTML page, and the outcome is
 * published through a single-assignment promise so writing the response
 * never waits on whoever consumes it.
 *
 * @module oauth/callback-server
 */

import {
  createServer as createHttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { createServer as createHttpsServer } from "node:https";
import type { Server as NetServer } from "node:net";
import type { LeafCertificate } from "../certs/authority.js";
import { CertificateError } from "../certs/errors.js";
import { DEFAULT_CALLBACK_PATH, DEFAULT_CALLBACK_PORT } from "../config/schema.js";
import { type Logger, silentLogger } from "../utils/logger.js";
import { BindError, ListenerError, type OAuthFlowError } from "./errors.js";
import { alreadyCompletedPage, errorPage, successPage } from "./pages.js";

/** Default bound for a graceful stop */
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;

/** Redirect scheme */
export type CallbackScheme = "http" | "https";

/**
 * What the callback server needs from either `http.Server` or `https.Server`.
 */
export type ListeningServer = NetServer & {
  closeAllConnections(): void;
  closeIdleConnections(): void;
};

/**
 * Result of the single expected callback request.
 */
export type CallbackOutcome =
  | { type: "code"; code: string }
  | { type: "provider_error"; error: string; description: string }
  | { type: "state_mismatch" }
  | { type: "missing_code" };

/**
 * A leaf certificate, or a function producing one on demand.
 */
export type CertificateSource =
  | LeafCertificate
  | (() => Promise<LeafCertificate>);

/**
 * Options for the callback server.
 */
export interface CallbackServerOptions {
  /** State value the callback must echo back exactly */
  expectedState: string;
  /** Port to listen on (default: 8888, 0 picks a free port) */
  port?: number | undefined;
  /** Path for callback endpoint (default: /callback) */
  path?: string | undefined;
  /** Interface to bind (default: 127.0.0.1) */
  host?: string | undefined;
  /** Redirect scheme (default: http) */
  scheme?: CallbackScheme;
  /** Certificate for https; required when scheme is https */
  certificate?: CertificateSource | undefined;
  logger?: Logger | undefined;
}

/**
 * Classifies callback query parameters.
 *
 * Order matters: a provider error wins over everything, then the state
 * check, then the presence of a code.
 */
export function classifyCallback(
  params: URLSearchParams,
  expectedState: string,
): CallbackOutcome {
  const error = params.get("error");
  if (error) {
    return {
      type: "provider_error",
      error,
      description: params.get("error_description") ?? "",
    };
  }

  if (params.get("state") !== expectedState) {
    return { type: "state_mismatch" };
  }

  const code = params.get("code");
  if (!code) {
    return { type: "missing_code" };
  }

  return { type: "code", code };
}

function renderOutcome(outcome: CallbackOutcome): { status: number; html: string } {
  switch (outcome.type) {
    case "code":
      return { status: 200, html: successPage() };
    case "provider_error":
      return { status: 400, html: errorPage(outcome.error, outcome.description) };
    case "state_mismatch":
      return {
        status: 400,
        html: errorPage("Invalid state", "State parameter mismatch"),
      };
    case "missing_code":
      return {
        status: 400,
        html: errorPage("Missing code", "No authorization code received"),
      };
  }
}

async function resolveCertificate(
  source: CertificateSource,
): Promise<LeafCertificate> {
  return typeof source === "function" ? source() : source;
}

/**
 * Local HTTP(S) server for receiving one OAuth callback.
 *
 * @example
 * ```ts
 * const server = new OAuthCallbackServer({ expectedState: state });
 * await server.start();
 * try {
 *   const outcome = await server.outcome;
 * } finally {
 *   await server.stop();
 * }
 * ```
 */
export class OAuthCallbackServer {
  /** Settles with the first callback outcome; later callbacks are ignored. */
  readonly outcome: Promise<CallbackOutcome>;
  /** Settles if the server fails after it started listening. */
  readonly failure: Promise<OAuthFlowError>;

  /** Underlying server while listening */
  protected server: ListeningServer | null = null;
  private settled = false;
  private boundPort: number;
  private resolveOutcome: (outcome: CallbackOutcome) => void = () => {};
  private resolveFailure: (error: OAuthFlowError) => void = () => {};
  private readonly expectedState: string;
  private readonly path: string;
  private readonly host: string;
  private readonly scheme: CallbackScheme;
  private readonly certificate: CertificateSource | undefined;
  private readonly logger: Logger;

  constructor(options: CallbackServerOptions) {
    this.expectedState = options.expectedState;
    this.boundPort = options.port ?? DEFAULT_CALLBACK_PORT;
    this.path = options.path ?? DEFAULT_CALLBACK_PATH;
    this.host = options.host ?? "127.0.0.1";
    this.scheme = options.scheme ?? "http";
    this.certificate = options.certificate;
    this.logger = options.logger ?? silentLogger;

    this.outcome = new Promise((resolve) => {
      this.resolveOutcome = resolve;
    });
    this.failure = new Promise((resolve) => {
      this.resolveFailure = resolve;
    });
  }

  /** Port the server is (or will be) bound to. */
  get port(): number {
    return this.boundPort;
  }

  /** Whether the server is currently accepting connections. */
  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Redirect URI the provider should send the browser to. */
  get callbackUrl(): string {
    return `${this.scheme}://localhost:${this.boundPort}${this.path}`;
  }

  /**
   * Binds the port and starts serving.
   *
   * @throws BindError if the port cannot be bound
   * @throws CertificateError if https is requested without a usable certificate
   */
  async start(): Promise<void> {
    if (this.server) {
      return;
    }

    const handler = (req: IncomingMessage, res: ServerResponse): void => {
      this.handleRequest(req, res);
    };

    let server: ListeningServer;
    if (this.scheme === "https") {
      if (!this.certificate) {
        throw new CertificateError("HTTPS callback requires a certificate");
      }
      const { cert, key } = await resolveCertificate(this.certificate);
      const httpsServer = createHttpsServer({ cert, key }, handler);
      httpsServer.on("tlsClientError", (err) => {
        this.logger.debug(`TLS handshake failed: ${err.message}`);
      });
      server = httpsServer;
    } else {
      server = createHttpServer(handler);
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        reject(new BindError(this.boundPort, err));
      };
      server.once("error", onError);
      server.listen(this.boundPort, this.host, () => {
        server.off("error", onError);
        resolve();
      });
    });

    server.on("error", (err) => {
      this.logger.debug(`Server error: ${err.message}`);
      this.resolveFailure(new ListenerError(err));
    });

    const address = server.address();
    if (address && typeof address === "object") {
      this.boundPort = address.port;
    }
    this.server = server;
    this.logger.debug(`Listening on ${this.callbackUrl}`);
  }

  /**
   * Stops the server and releases the port.
   * Idle connections close at once; active ones get `timeoutMs` to finish.
   *
   * @param timeoutMs - Upper bound before remaining connections are dropped
   */
  async stop(timeoutMs: number = DEFAULT_SHUTDOWN_TIMEOUT_MS): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server?.listening) {
      return;
    }

    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        this.logger.debug("Graceful shutdown timed out; closing connections");
        server.closeAllConnections();
      }, timeoutMs);
      forceTimer.unref();

      server.close(() => {
        clearTimeout(forceTimer);
        resolve();
      });
      server.closeIdleConnections();
    });
    this.logger.debug(`Stopped listening on port ${this.boundPort}`);
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? "/", `${this.scheme}://localhost`);

    if (url.pathname !== this.path) {
      res.writeHead(404, { "Content-Type": "text/plain", Connection: "close" });
      res.end("Not Found");
      return;
    }

    if (this.settled) {
      this.logger.debug("Ignoring repeated callback request");
      res.writeHead(409, {
        "Content-Type": "text/html; charset=utf-8",
        Connection: "close",
      });
      res.end(alreadyCompletedPage());
      return;
    }

    const outcome = classifyCallback(url.searchParams, this.expectedState);
    this.settled = true;

    const { status, html } = renderOutcome(outcome);
    res.writeHead(status, {
      "Content-Type": "text/html; charset=utf-8",
      "Cache-Control": "no-store",
      Connection: "close",
    });
    res.end(html);

    this.logger.debug(`Callback received: ${outcome.type}`);
    this.resolveOutcome(outcome);
  }
}
