/**
 * Anti-forgery state for authorization requests.
 *
 * @module oauth/state
 */

import { randomBytes } from "node:crypto";

/** Bytes of randomness in a state value */
export const STATE_BYTES = 32;

/**
 * Generates a fresh state value: 32 random bytes, base64url without padding.
 * Call once per flow; never reuse a value.
 */
export function generateState(): string {
  return randomBytes(STATE_BYTES).toString("base64url");
}
