/**
 * OS trust store integration for the local certificate authority.
 *
 * Platform-specific commands:
 * - macOS: `security` against the login keychain
 * - Linux: copy into the distribution CA bundle and refresh it (Debian
 *   layout first, RHEL/Fedora layout as fallback; needs sudo)
 * - Windows: `certutil` against the per-user Root store
 *
 * @module certs/trust
 */

import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { type Logger, silentLogger } from "../utils/logger.js";
import { CA_COMMON_NAME } from "./authority.js";
import { TrustInstallError } from "./errors.js";

/** Anchor path on Debian/Ubuntu (update-ca-certificates). */
export const DEBIAN_ANCHOR_PATH =
  "/usr/local/share/ca-certificates/tokenlink-ca.crt";

/** Anchor path on RHEL/Fedora (update-ca-trust). */
export const RHEL_ANCHOR_PATH =
  "/etc/pki/ca-trust/source/anchors/tokenlink-ca.crt";

/**
 * Result of running an external command.
 */
export interface CommandResult {
  /** Exit code (non-zero or -1 when the command could not be started) */
  code: number;
  /** Combined stdout and stderr */
  output: string;
}

/**
 * Runs an external command without a shell.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
) => Promise<CommandResult>;

/**
 * Default runner backed by `execFile`. Never rejects: spawn failures are
 * reported as a non-zero result so callers can surface the output.
 */
export const execCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    execFile(command, [...args], { encoding: "utf-8" }, (error, stdout, stderr) => {
      const output = `${stdout}${stderr}`;
      if (!error) {
        resolve({ code: 0, output });
        return;
      }
      const code = typeof error.code === "number" ? error.code : -1;
      resolve({ code, output: output || error.message });
    });
  });

export interface TrustStoreOptions {
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  /** File existence check, used for the Linux anchor lookup */
  fileExists?: (path: string) => boolean;
  logger?: Logger;
}

/**
 * Queries and edits the OS trust store for the tokenlink CA.
 */
export class TrustStore {
  private readonly run: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly fileExists: (path: string) => boolean;
  private readonly logger: Logger;

  constructor(options: TrustStoreOptions = {}) {
    this.run = options.runner ?? execCommand;
    this.platform = options.platform ?? process.platform;
    this.fileExists = options.fileExists ?? existsSync;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Whether the CA is present in the OS trust store.
   */
  async isAuthorityTrusted(): Promise<boolean> {
    switch (this.platform) {
      case "darwin": {
        const result = await this.run("security", [
          "find-certificate",
          "-c",
          CA_COMMON_NAME,
          "login.keychain",
        ]);
        return result.code === 0;
      }
      case "linux":
        return (
          this.fileExists(DEBIAN_ANCHOR_PATH) ||
          this.fileExists(RHEL_ANCHOR_PATH)
        );
      case "win32": {
        const result = await this.run("certutil", [
          "-verifystore",
          "-user",
          "Root",
          CA_COMMON_NAME,
        ]);
        return result.code === 0;
      }
      default:
        return false;
    }
  }

  /**
   * Adds the CA certificate to the OS trust store.
   *
   * @param certPath - Path to the CA certificate PEM
   * @throws TrustInstallError with the command output on failure
   */
  async installAuthority(certPath: string): Promise<void> {
    switch (this.platform) {
      case "darwin":
        await this.runOrThrow(
          "Failed to install CA on macOS",
          "security",
          ["add-trusted-cert", "-r", "trustRoot", "-k", "login.keychain", certPath],
        );
        return;
      case "linux":
        await this.installLinux(certPath);
        return;
      case "win32":
        await this.runOrThrow("Failed to install CA on Windows", "certutil", [
          "-addstore",
          "-user",
          "Root",
          certPath,
        ]);
        return;
      default:
        throw new TrustInstallError(
          `Unsupported operating system: ${this.platform}`,
        );
    }
  }

  /**
   * Removes the CA certificate from the OS trust store.
   *
   * @throws TrustInstallError with the command output on failure (macOS, Windows)
   */
  async uninstallAuthority(): Promise<void> {
    switch (this.platform) {
      case "darwin":
        await this.runOrThrow("Failed to uninstall CA on macOS", "security", [
          "delete-certificate",
          "-c",
          CA_COMMON_NAME,
          "login.keychain",
        ]);
        return;
      case "linux":
        await this.uninstallLinux();
        return;
      case "win32":
        await this.runOrThrow("Failed to uninstall CA on Windows", "certutil", [
          "-delstore",
          "-user",
          "Root",
          CA_COMMON_NAME,
        ]);
        return;
      default:
        throw new TrustInstallError(
          `Unsupported operating system: ${this.platform}`,
        );
    }
  }

  private async installLinux(certPath: string): Promise<void> {
    const debian = await this.run("sudo", ["cp", certPath, DEBIAN_ANCHOR_PATH]);
    if (debian.code === 0) {
      await this.runOrThrow("Failed to update CA certificates", "sudo", [
        "update-ca-certificates",
      ]);
      return;
    }

    this.logger.debug(
      `Debian anchor copy failed (${debian.code}), trying RHEL layout: ${debian.output.trim()}`,
    );
    await this.runOrThrow("Failed to copy CA certificate", "sudo", [
      "cp",
      certPath,
      RHEL_ANCHOR_PATH,
    ]);
    await this.runOrThrow("Failed to update CA trust", "sudo", [
      "update-ca-trust",
    ]);
  }

  /**
   * Removes both anchors and refreshes both bundles. Only one layout exists
   * on a given machine, so individual failures are expected.
   */
  private async uninstallLinux(): Promise<void> {
    const steps: Array<[string, string[]]> = [
      ["sudo", ["rm", "-f", DEBIAN_ANCHOR_PATH]],
      ["sudo", ["rm", "-f", RHEL_ANCHOR_PATH]],
      ["sudo", ["update-ca-certificates"]],
      ["sudo", ["update-ca-trust"]],
    ];

    for (const [command, args] of steps) {
      const result = await this.run(command, args);
      if (result.code !== 0) {
        this.logger.debug(
          `${command} ${args.join(" ")} exited ${result.code}: ${result.output.trim()}`,
        );
      }
    }
  }

  private async runOrThrow(
    message: string,
    command: string,
    args: string[],
  ): Promise<void> {
    this.logger.debug(`Running: ${command} ${args.join(" ")}`);
    const result = await this.run(command, args);
    if (result.code !== 0) {
      throw new TrustInstallError(
        `${message} (exit ${result.code})`,
        result.output,
      );
    }
  }
}

/**
 * Shell commands the user can run to trust the CA by hand.
 *
 * @param certPath - Path to the CA certificate PEM
 * @param platform - Target platform (default: current)
 */
export function manualInstallInstructions(
  certPath: string,
  platform: NodeJS.Platform = process.platform,
): string[] {
  switch (platform) {
    case "darwin":
      return [
        "  macOS:",
        `    security add-trusted-cert -r trustRoot -k login.keychain ${certPath}`,
      ];
    case "linux":
      return [
        "  Ubuntu/Debian:",
        `    sudo cp ${certPath} ${DEBIAN_ANCHOR_PATH}`,
        "    sudo update-ca-certificates",
        "",
        "  RHEL/Fedora:",
        `    sudo cp ${certPath} ${RHEL_ANCHOR_PATH}`,
        "    sudo update-ca-trust",
      ];
    case "win32":
      return ["  Windows:", `    certutil -addstore -user Root ${certPath}`];
    default:
      return [`  Add ${certPath} to your system's trusted root certificates.`];
  }
}
