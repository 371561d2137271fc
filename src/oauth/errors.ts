/**
 * Error classes for the loopback authorization flow.
 *
 * Every flow failure is an {@link OAuthFlowError} carrying a `kind`
 * discriminant so callers can branch without `instanceof` chains.
 * None of these are retried: the flow is interactive and the user
 * restarts it.
 *
 * @module oauth/errors
 */

export type OAuthFlowErrorKind =
  | "bind"
  | "csrf_mismatch"
  | "provider_denied"
  | "missing_code"
  | "timeout"
  | "cancelled"
  | "exchange"
  | "listener";

/**
 * Base error class for authorization flow failures.
 */
export class OAuthFlowError extends Error {
  constructor(
    public readonly kind: OAuthFlowErrorKind,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "OAuthFlowError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * The callback port could not be bound (usually already in use).
 */
export class BindError extends OAuthFlowError {
  constructor(
    public readonly port: number,
    cause?: unknown,
  ) {
    const code =
      cause && typeof cause === "object" && "code" in cause
        ? String(cause.code)
        : undefined;
    const reason =
      code === "EADDRINUSE"
        ? "port is already in use"
        : cause instanceof Error
          ? cause.message
          : "bind failed";
    super("bind", `Cannot listen on localhost:${port}: ${reason}`, cause);
    this.name = "BindError";
  }
}

/**
 * The callback's `state` did not match the one this flow generated.
 */
export class CsrfMismatchError extends OAuthFlowError {
  constructor() {
    super("csrf_mismatch", "OAuth state mismatch - possible CSRF attack");
    this.name = "CsrfMismatchError";
  }
}

/**
 * The user or the provider rejected the authorization request.
 */
export class ProviderDeniedError extends OAuthFlowError {
  constructor(
    public readonly error: string,
    public readonly description: string,
  ) {
    super(
      "provider_denied",
      description ? `${error}: ${description}` : error,
    );
    this.name = "ProviderDeniedError";
  }
}

/**
 * The callback carried neither an error nor an authorization code.
 */
export class MissingCodeError extends OAuthFlowError {
  constructor() {
    super("missing_code", "No authorization code in callback");
    this.name = "MissingCodeError";
  }
}

/**
 * No callback arrived within the allowed window.
 */
export class FlowTimeoutError extends OAuthFlowError {
  constructor(public readonly timeoutMs: number) {
    super(
      "timeout",
      `Authentication timed out after ${Math.round(timeoutMs / 1000)}s`,
    );
    this.name = "FlowTimeoutError";
  }
}

/**
 * The flow was aborted through its AbortSignal.
 */
export class FlowCancelledError extends OAuthFlowError {
  constructor(cause?: unknown) {
    super("cancelled", "Authentication cancelled", cause);
    this.name = "FlowCancelledError";
  }
}

/**
 * The code-for-token exchange failed: transport error, non-200 status or
 * an unusable response body. The raw body is kept for diagnosis.
 */
export class ExchangeError extends OAuthFlowError {
  constructor(
    message: string,
    public readonly body?: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super("exchange", message, cause);
    this.name = "ExchangeError";
  }
}

/**
 * The callback listener failed after it started serving.
 */
export class ListenerError extends OAuthFlowError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("listener", `Callback server error: ${detail}`, cause);
    this.name = "ListenerError";
  }
}
