/**
 * OAuth module exports.
 *
 * Loopback authorization-code flow for CLI tools:
 * - Callback listener on localhost (http or https)
 * - Authorization URL construction with a CSRF state value
 * - Provider-specific token exchange
 *
 * @module oauth
 */

export {
  type AuthorizationRequest,
  buildAuthorizationUrl,
  buildRedirectUri,
  createAuthorizationRequest,
  redirectSchemeFor,
} from "./authorization-url.js";
export { type BrowserOpener, browserCommand, openBrowser } from "./browser.js";
export {
  type CallbackOutcome,
  type CallbackScheme,
  type CallbackServerOptions,
  type CertificateSource,
  classifyCallback,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  OAuthCallbackServer,
} from "./callback-server.js";
export {
  BindError,
  CsrfMismatchError,
  ExchangeError,
  FlowCancelledError,
  FlowTimeoutError,
  ListenerError,
  MissingCodeError,
  OAuthFlowError,
  type OAuthFlowErrorKind,
  ProviderDeniedError,
} from "./errors.js";
export {
  type AuthorizationFlowOptions,
  type AuthorizationFlowResult,
  DEFAULT_FLOW_TIMEOUT_MS,
  type FlowState,
  runAuthorizationFlow,
} from "./flow.js";
export { generateState } from "./state.js";
export {
  type ClientCredentials,
  computeExpiresAt,
  isTokenExpired,
  type Token,
} from "./token.js";
export {
  buildTokenRequest,
  DEFAULT_EXCHANGE_TIMEOUT_MS,
  type ExchangeCodeOptions,
  exchangeCode,
} from "./token-exchange.js";
