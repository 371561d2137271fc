/**
 * Idempotent "make sure the local CA exists and is trusted" step.
 *
 * Shared by `tokenlink init` and by `tokenlink login` for providers that
 * require an HTTPS redirect, so both ask the same question and degrade the
 * same way.
 *
 * @module certs/ensure-trust
 */

import { type Logger, colors } from "../utils/logger.js";
import type { CertificateAuthorityManager } from "./authority.js";
import { TrustInstallError } from "./errors.js";
import { manualInstallInstructions, type TrustStore } from "./trust.js";

/**
 * Outcome of {@link ensureTrust}.
 * - trusted: nothing to do, the CA exists and is installed
 * - installed: the CA was (generated and) installed now
 * - declined: the user said no; the CA exists but is not trusted
 * - untrusted: installing failed; the CA exists but is not trusted
 */
export type EnsureTrustStatus = "trusted" | "installed" | "declined" | "untrusted";

export interface EnsureTrustResult {
  status: EnsureTrustStatus;
  /** Whether a new CA was generated during this call */
  generated: boolean;
  certificatePath: string;
}

export interface EnsureTrustOptions {
  authority: CertificateAuthorityManager;
  trustStore: TrustStore;
  logger: Logger;
  /** Asks a yes/no question; resolves true for yes */
  confirm: (question: string) => Promise<boolean>;
  /** Regenerate the CA even if one exists */
  force?: boolean;
  /** Skip the confirmation prompt */
  assumeYes?: boolean;
  /** Explanation printed before the prompt */
  reason?: string;
  platform?: NodeJS.Platform;
}

function printManualInstructions(
  logger: Logger,
  certPath: string,
  platform: NodeJS.Platform,
): void {
  logger.info("You can install it manually:");
  for (const line of manualInstallInstructions(certPath, platform)) {
    logger.info(line);
  }
  logger.info("");
}

/**
 * Ensures the local CA exists and, with the user's consent, is trusted.
 *
 * Generation failures are fatal (CertificateError propagates). Trust store
 * failures are not: the CA still works, the browser just warns.
 */
export async function ensureTrust(
  options: EnsureTrustOptions,
): Promise<EnsureTrustResult> {
  const { authority, trustStore, logger } = options;
  const platform = options.platform ?? process.platform;
  const force = options.force ?? false;
  const certificatePath = authority.certificatePath;

  const exists = authority.authorityExists();
  if (exists && !force && (await trustStore.isAuthorityTrusted())) {
    logger.debug(`CA at ${certificatePath} is already trusted`);
    return { status: "trusted", generated: false, certificatePath };
  }

  let generated = false;
  const generate = async (): Promise<void> => {
    logger.info("Generating local certificate authority...");
    await authority.generateAuthority();
    generated = true;
    logger.info(`${colors.green}✓${colors.reset} Certificate authority generated`);
  };

  if (options.reason) {
    logger.info(options.reason);
    logger.info("");
  }
  logger.info(`Certificate location: ${certificatePath}`);
  if (platform === "linux") {
    logger.info("Note: On Linux, installing the certificate requires sudo access.");
  }
  logger.info("");

  const accepted =
    options.assumeYes === true ||
    (await options.confirm("Install the tokenlink certificate authority now? [Y/n] "));

  if (!exists || force) {
    await generate();
  }

  if (!accepted) {
    logger.info("");
    logger.info("Certificate authority was not installed.");
    logger.info(
      "Your browser will show a security warning; choose 'Advanced' → 'Proceed to localhost' to continue.",
    );
    printManualInstructions(logger, certificatePath, platform);
    return { status: "declined", generated, certificatePath };
  }

  logger.info("Installing to system trust store...");
  try {
    await trustStore.installAuthority(certificatePath);
  } catch (err) {
    if (!(err instanceof TrustInstallError)) {
      throw err;
    }
    logger.warn(err.message);
    logger.info("");
    printManualInstructions(logger, certificatePath, platform);
    logger.info("Continuing with an untrusted certificate (browser will warn).");
    return { status: "untrusted", generated, certificatePath };
  }

  logger.info(`${colors.green}✓${colors.reset} Certificate authority installed`);
  return { status: "installed", generated, certificatePath };
}
