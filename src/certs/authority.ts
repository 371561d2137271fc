/**
 * Local certificate authority for HTTPS loopback callbacks.
 *
 * Some providers refuse `http://localhost` redirect URIs. For those the
 * callback listener terminates TLS with a short-lived leaf certificate
 * signed by a long-lived local CA that the user can add to the OS trust
 * store (see ./trust.ts).
 *
 * Files (under ~/.config/tokenlink/certs, directory 0700):
 * - tokenlink-ca-key.pem: EC P-256 private key (0600)
 * - tokenlink-ca.pem: self-signed CA certificate (0644)
 *
 * @module certs/authority
 */

import "reflect-metadata";
import {
  X509Certificate as NodeX509Certificate,
  createPrivateKey,
  KeyObject,
  randomBytes,
  webcrypto,
} from "node:crypto";
import { chmodSync, existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import * as x509 from "@peculiar/x509";
import { ensureDir, getCertsDir } from "../config/paths.js";
import { CertificateError } from "./errors.js";

x509.cryptoProvider.set(webcrypto);

/** Common name of the CA; the trust store operations look it up by this. */
export const CA_COMMON_NAME = "tokenlink Local CA";

/** Host name the leaf certificate is issued for. */
export const LOOPBACK_HOSTNAME = "localhost";

const CA_KEY_FILE = "tokenlink-ca-key.pem";
const CA_CERT_FILE = "tokenlink-ca.pem";

const CA_VALIDITY_YEARS = 10;
const LEAF_VALIDITY_YEARS = 1;

const EC_ALGORITHM = { name: "ECDSA", namedCurve: "P-256" } as const;
const SIGNING_ALGORITHM = { name: "ECDSA", hash: "SHA-256" } as const;

/**
 * PEM-encoded certificate and private key, ready for `https.createServer`.
 */
export interface LeafCertificate {
  cert: string;
  key: string;
}

/**
 * Parsed authority: the certificate plus its signing key.
 */
export interface LoadedAuthority {
  certificate: x509.X509Certificate;
  privateKey: webcrypto.CryptoKey;
  certificatePem: string;
}

export interface CertificateAuthorityManagerOptions {
  /** Directory for the CA files (default: ~/.config/tokenlink/certs) */
  dir?: string;
  /** Clock used for validity windows */
  now?: () => Date;
}

function addYears(date: Date, years: number): Date {
  const result = new Date(date.getTime());
  result.setUTCFullYear(result.getUTCFullYear() + years);
  return result;
}

/**
 * Random positive 128-bit serial number as hex.
 */
function generateSerialNumber(): string {
  const bytes = randomBytes(16);
  bytes[0] = (bytes[0] ?? 0) & 0x7f;
  return bytes.toString("hex");
}

function exportPrivateKeyPem(key: webcrypto.CryptoKey): string {
  const exported = KeyObject.from(key).export({ type: "sec1", format: "pem" });
  return typeof exported === "string" ? exported : exported.toString("utf-8");
}

async function importSigningKey(pem: string): Promise<webcrypto.CryptoKey> {
  const der = createPrivateKey(pem).export({ type: "pkcs8", format: "der" });
  return webcrypto.subtle.importKey("pkcs8", der, EC_ALGORITHM, false, [
    "sign",
  ]);
}

function generateKeyPair(): Promise<webcrypto.CryptoKeyPair> {
  return webcrypto.subtle.generateKey(EC_ALGORITHM, true, ["sign", "verify"]);
}

/**
 * Creates, loads and signs with the local certificate authority.
 *
 * No locking is done: regeneration is an explicit user action and callers
 * run one flow at a time.
 */
export class CertificateAuthorityManager {
  private readonly dir: string;
  private readonly now: () => Date;

  constructor(options: CertificateAuthorityManagerOptions = {}) {
    this.dir = options.dir ?? getCertsDir();
    this.now = options.now ?? (() => new Date());
  }

  /** Path to the CA certificate (the file installed into trust stores). */
  get certificatePath(): string {
    return join(this.dir, CA_CERT_FILE);
  }

  /** Path to the CA private key. */
  get keyPath(): string {
    return join(this.dir, CA_KEY_FILE);
  }

  /**
   * True iff both files exist and parse as a private key and a certificate.
   */
  authorityExists(): boolean {
    if (!existsSync(this.keyPath) || !existsSync(this.certificatePath)) {
      return false;
    }

    try {
      createPrivateKey(readFileSync(this.keyPath, "utf-8"));
      new NodeX509Certificate(readFileSync(this.certificatePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Generates a new CA key pair and self-signed certificate, replacing any
   * existing authority. Callers must confirm with the user first.
   *
   * @throws CertificateError if key generation, signing or writing fails
   */
  async generateAuthority(): Promise<void> {
    let keyPem: string;
    let certPem: string;

    try {
      const keys = await generateKeyPair();
      const notBefore = this.now();
      const certificate = await x509.X509CertificateGenerator.createSelfSigned({
        serialNumber: generateSerialNumber(),
        name: `CN=${CA_COMMON_NAME}, O=tokenlink, OU=Development CA`,
        notBefore,
        notAfter: addYears(notBefore, CA_VALIDITY_YEARS),
        keys,
        signingAlgorithm: SIGNING_ALGORITHM,
        extensions: [
          new x509.BasicConstraintsExtension(true, 0, true),
          new x509.KeyUsagesExtension(
            x509.KeyUsageFlags.keyCertSign | x509.KeyUsageFlags.cRLSign,
            true,
          ),
          await x509.SubjectKeyIdentifierExtension.create(keys.publicKey),
        ],
      });

      keyPem = exportPrivateKeyPem(keys.privateKey);
      certPem = certificate.toString("pem");
    } catch (err) {
      throw new CertificateError("Failed to create CA certificate", err);
    }

    try {
      ensureDir(this.dir, 0o700);
      chmodSync(this.dir, 0o700);
      writeFileSync(this.keyPath, keyPem, { mode: 0o600 });
      chmodSync(this.keyPath, 0o600);
      writeFileSync(this.certificatePath, `${certPem}\n`, { mode: 0o644 });
      chmodSync(this.certificatePath, 0o644);
    } catch (err) {
      throw new CertificateError("Failed to write CA files", err);
    }
  }

  /**
   * Reads and parses the persisted authority.
   *
   * @throws CertificateError if the files are missing or malformed
   */
  async loadAuthority(): Promise<LoadedAuthority> {
    if (!existsSync(this.keyPath) || !existsSync(this.certificatePath)) {
      throw new CertificateError(
        `Certificate authority not found in ${this.dir}. Run 'tokenlink init' first.`,
      );
    }

    let privateKey: webcrypto.CryptoKey;
    try {
      privateKey = await importSigningKey(readFileSync(this.keyPath, "utf-8"));
    } catch (err) {
      throw new CertificateError("Failed to parse CA private key", err);
    }

    let certificate: x509.X509Certificate;
    let certificatePem: string;
    try {
      certificatePem = readFileSync(this.certificatePath, "utf-8");
      certificate = new x509.X509Certificate(certificatePem);
    } catch (err) {
      throw new CertificateError("Failed to parse CA certificate", err);
    }

    return { certificate, privateKey, certificatePem };
  }

  /**
   * Issues a fresh leaf certificate for `localhost`, signed by the CA.
   * The result only lives in memory.
   *
   * @throws CertificateError if the authority is missing or signing fails
   */
  async issueLeafCertificate(): Promise<LeafCertificate> {
    const authority = await this.loadAuthority();

    try {
      const keys = await generateKeyPair();
      const notBefore = this.now();
      const certificate = await x509.X509CertificateGenerator.create({
        serialNumber: generateSerialNumber(),
        subject: `CN=${LOOPBACK_HOSTNAME}, O=tokenlink`,
        issuer: authority.certificate.subject,
        notBefore,
        notAfter: addYears(notBefore, LEAF_VALIDITY_YEARS),
        publicKey: keys.publicKey,
        signingKey: authority.privateKey,
        signingAlgorithm: SIGNING_ALGORITHM,
        extensions: [
          new x509.BasicConstraintsExtension(false, undefined, true),
          new x509.KeyUsagesExtension(
            x509.KeyUsageFlags.digitalSignature |
              x509.KeyUsageFlags.keyEncipherment,
            true,
          ),
          new x509.ExtendedKeyUsageExtension([x509.ExtendedKeyUsage.serverAuth]),
          new x509.SubjectAlternativeNameExtension([
            { type: "dns", value: LOOPBACK_HOSTNAME },
          ]),
          await x509.AuthorityKeyIdentifierExtension.create(
            authority.certificate,
          ),
        ],
      });

      return {
        cert: certificate.toString("pem"),
        key: exportPrivateKeyPem(keys.privateKey),
      };
    } catch (err) {
      throw new CertificateError("Failed to issue localhost certificate", err);
    }
  }
}
