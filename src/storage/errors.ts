/**
 * Secret storage errors.
 *
 * @module storage/errors
 */

/**
 * A stored secret exists but cannot be used (bad JSON, wrong shape).
 */
export class SecretStoreError extends Error {
  constructor(
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = "SecretStoreError";
  }
}

/**
 * The store itself cannot be reached (permissions, read-only filesystem).
 * Callers can fall back to environment variables.
 */
export class SecretStoreUnavailableError extends SecretStoreError {
  constructor(
    public readonly path: string,
    cause?: unknown,
    hint?: string,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(
      `Secret store unavailable at ${path}${detail}${hint ? `\n\n${hint}` : ""}`,
      cause,
    );
    this.name = "SecretStoreUnavailableError";
  }
}

/**
 * Node's errno code for a failed filesystem call, if it has one.
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
