/**
 * Certificate error classes.
 *
 * @module certs/errors
 */

/**
 * Generating, loading or signing a certificate failed.
 * Fatal to the flow that needed it.
 */
export class CertificateError extends Error {
  constructor(
    message: string,
    public override readonly cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`${message}${detail}`, { cause });
    this.name = "CertificateError";
  }
}

/**
 * Adding or removing the authority from the OS trust store failed.
 * Callers degrade to an untrusted certificate and print manual steps.
 */
export class TrustInstallError extends Error {
  constructor(
    message: string,
    /** Combined stdout/stderr of the failing command */
    public readonly output: string = "",
    public override readonly cause?: unknown,
  ) {
    const trimmed = output.trim();
    super(trimmed ? `${message}\nOutput: ${trimmed}` : message, { cause });
    this.name = "TrustInstallError";
  }
}
