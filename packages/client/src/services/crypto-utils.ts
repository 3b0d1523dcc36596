/**
 * Hashing, encoding and certificate (de)serialization helpers
 */
import { createHash } from "node:crypto";

import { isValidPEM } from "@dssp-client/shared";
import * as asn1js from "asn1js";
import { Certificate } from "pkijs";

/**
 * Calculate SHA-1 hash of data
 */
export function sha1(data: Uint8Array): Buffer {
  return createHash("sha1").update(data).digest();
}

/**
 * Convert buffer to base64 string
 */
export function toBase64(buffer: Uint8Array): string {
  return Buffer.from(buffer).toString("base64");
}

/**
 * Convert buffer to hex string
 */
export function toHex(buffer: Uint8Array): string {
  return Buffer.from(buffer).toString("hex");
}

/**
 * Convert PEM to DER
 */
export function pemToDer(pem: string): Buffer {
  const b64 = pem
    .replace(/-----BEGIN [^-]+-----/g, "")
    .replace(/-----END [^-]+-----/g, "")
    .replace(/\s+/g, "");
  return Buffer.from(b64, "base64");
}

/**
 * Convert DER to PEM format
 */
export function derToPem(der: Uint8Array, label = "CERTIFICATE"): string {
  const b64 = toBase64(der);
  const body = b64.match(/.{1,64}/g)?.join("\n") ?? b64;
  return `-----BEGIN ${label}-----\n${body}\n-----END ${label}-----\n`;
}

/**
 * Split a PEM bundle into its individual blocks
 */
export function splitPemBundle(bundle: string): string[] {
  return bundle.match(/-----BEGIN [^-]+-----[\s\S]*?-----END [^-]+-----/g) ?? [];
}

/**
 * Parse DER bytes into a PKI.js Certificate, or null when they do not decode
 */
export function parseCertificate(der: Uint8Array): Certificate | null {
  try {
    const asn1 = asn1js.fromBER(der);
    if (asn1.offset === -1) return null;
    return new Certificate({ schema: asn1.result });
  } catch {
    return null;
  }
}

/**
 * Parse a PEM certificate, or null when it is not one
 */
export function parseCertificatePem(pem: string): Certificate | null {
  if (!isValidPEM(pem)) return null;
  return parseCertificate(pemToDer(pem));
}

/**
 * DER encoding of a certificate (the decoded bytes when it was parsed)
 */
export function certificateToDer(cert: Certificate): Uint8Array {
  return new Uint8Array(cert.toSchema().toBER(false));
}

/**
 * SHA-1 thumbprint as uppercase hex, the form certificate stores index by
 */
export function certificateThumbprint(cert: Certificate): string {
  return toHex(sha1(certificateToDer(cert))).toUpperCase();
}

/**
 * Serial number as uppercase hex
 */
export function certificateSerialNumber(cert: Certificate): string {
  return toHex(new Uint8Array(cert.serialNumber.valueBlock.valueHexView)).toUpperCase();
}
