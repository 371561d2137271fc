/**
 * Secret storage exports.
 *
 * @module storage
 */

export {
  CredentialStore,
  CredentialsNotFoundError,
  credentialEnvNames,
  resolveCredentials,
} from "./credentials.js";
export { SecretStoreError, SecretStoreUnavailableError } from "./errors.js";
export { TokenStorage } from "./token-storage.js";
