/**
 * @localpilot/tls
 *
 * Certificate material for the HTTPS listener: configured PEM files or
 * an in-memory self-signed certificate for localhost.
 *
 * @packageDocumentation
 */

export { issueSelfSigned, loadCertificate, resolveCertificate } from "./certificate.js";
export type { CertificateMaterial, IssueOptions } from "./certificate.js";
