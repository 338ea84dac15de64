/**
 * TLS material for the HTTPS listener.
 *
 * Either loads a configured certificate/key pair from disk or issues an
 * ephemeral self-signed certificate for `localhost`. Issued material is
 * never written anywhere; it lives for the process lifetime only.
 */

import fs from "node:fs";

import forge from "node-forge";

import { CertificateGenerationError, ConfigError } from "@localpilot/core";

/** PEM-encoded certificate and private key. */
export interface CertificateMaterial {
  readonly cert: string;
  readonly key: string;
}

export interface IssueOptions {
  /** Subject and issuer CN. Default: "localhost". */
  commonName?: string;
  /** Validity in years from `now`. Default: 30. */
  validityYears?: number;
  /** RSA modulus size. Default: 2048. */
  keyBits?: number;
  /** Start of validity. Default: the current time. */
  now?: Date;
}

/**
 * Issue a self-signed certificate: serial 1, key usages
 * keyEncipherment + digitalSignature + keyCertSign, extended usage
 * serverAuth.
 *
 * @throws CertificateGenerationError if key generation or encoding fails.
 */
export function issueSelfSigned(options: IssueOptions = {}): CertificateMaterial {
  const commonName = options.commonName ?? "localhost";
  const validityYears = options.validityYears ?? 30;
  const keyBits = options.keyBits ?? 2048;
  const now = options.now ?? new Date();

  try {
    const keys = forge.pki.rsa.generateKeyPair({ bits: keyBits, e: 0x10001 });
    const cert = forge.pki.createCertificate();

    cert.publicKey = keys.publicKey;
    cert.serialNumber = "01";

    const notAfter = new Date(now.getTime());
    notAfter.setFullYear(notAfter.getFullYear() + validityYears);
    cert.validity.notBefore = new Date(now.getTime());
    cert.validity.notAfter = notAfter;

    const attrs = [{ name: "commonName", value: commonName }];
    cert.setSubject(attrs);
    cert.setIssuer(attrs);
    cert.setExtensions([
      { name: "basicConstraints", cA: false },
      {
        name: "keyUsage",
        keyEncipherment: true,
        digitalSignature: true,
        keyCertSign: true,
      },
      { name: "extKeyUsage", serverAuth: true },
    ]);

    cert.sign(keys.privateKey, forge.md.sha256.create());

    return Object.freeze({
      cert: forge.pki.certificateToPem(cert),
      key: forge.pki.privateKeyToPem(keys.privateKey),
    });
  } catch (err: unknown) {
    throw new CertificateGenerationError(
      `Failed to issue self-signed certificate: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

/**
 * Read a certificate/key pair from PEM files.
 *
 * @throws ConfigError if either file cannot be read.
 */
export function loadCertificate(certPath: string, keyPath: string): CertificateMaterial {
  const read = (path: string, what: string): string => {
    try {
      return fs.readFileSync(path, "utf8");
    } catch (err: unknown) {
      throw new ConfigError(
        `Cannot read ${what} file ${path}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  };
  return Object.freeze({
    cert: read(certPath, "certificate"),
    key: read(keyPath, "key"),
  });
}

/**
 * Configured pair when both paths are set, otherwise a freshly issued
 * self-signed certificate.
 */
export function resolveCertificate(
  paths: { certPath: string | null; keyPath: string | null },
  issue: () => CertificateMaterial = issueSelfSigned,
): { material: CertificateMaterial; selfSigned: boolean } {
  if (paths.certPath && paths.keyPath) {
    return { material: loadCertificate(paths.certPath, paths.keyPath), selfSigned: false };
  }
  return { material: issue(), selfSigned: true };
}
