/**
 * Local signature for the two-step flow.
 *
 * The service hands out the document hash; the signature is computed here with
 * the signer's private key over that hash (RSASSA-PKCS1-v1_5 over a DigestInfo
 * built from the precomputed digest) and sent back on download.
 */
import { constants, privateEncrypt } from "node:crypto";

import { DIGEST_METHODS } from "@dssp-client/shared";
import * as asn1js from "asn1js";

import { DsspPreconditionError } from "../errors";
import { logDssp, dsspClientLogger } from "../logger";

import type { DigestSigner, TwoStepSession } from "../types";
import type { KeyObject } from "node:crypto";

interface DigestSpec {
  oid: string;
  length: number;
}

const DIGESTS: Record<string, DigestSpec> = {
  [DIGEST_METHODS.SHA1]: { oid: "1.3.14.3.2.26", length: 20 },
  [DIGEST_METHODS.SHA256]: { oid: "2.16.840.1.101.3.4.2.1", length: 32 },
  [DIGEST_METHODS.SHA384]: { oid: "2.16.840.1.101.3.4.2.2", length: 48 },
  [DIGEST_METHODS.SHA512]: { oid: "2.16.840.1.101.3.4.2.3", length: 64 },
};

/**
 * DER DigestInfo ::= SEQUENCE { digestAlgorithm AlgorithmIdentifier, digest OCTET STRING }
 */
export function encodeDigestInfo(digestAlgorithm: string, digest: Uint8Array): Buffer {
  const spec = DIGESTS[digestAlgorithm];
  if (!spec) {
    throw new DsspPreconditionError(`Unsupported digest algorithm: ${digestAlgorithm}`, "digestAlgorithm");
  }
  if (digest.length !== spec.length) {
    throw new DsspPreconditionError(
      `Digest is ${digest.length.toString()} bytes, expected ${spec.length.toString()} for ${digestAlgorithm}`,
      "digest",
    );
  }

  const digestInfo = new asn1js.Sequence({
    value: [
      new asn1js.Sequence({
        value: [new asn1js.ObjectIdentifier({ value: spec.oid }), new asn1js.Null()],
      }),
      new asn1js.OctetString({ valueHex: new Uint8Array(digest) }),
    ],
  });

  return Buffer.from(digestInfo.toBER(false));
}

/**
 * DigestSigner over an RSA private key held in memory
 */
export class RsaDigestSigner implements DigestSigner {
  private readonly privateKey: KeyObject;

  constructor(privateKey: KeyObject) {
    if (privateKey.type !== "private" || privateKey.asymmetricKeyType !== "rsa") {
      throw new DsspPreconditionError("An RSA private key is required", "privateKey");
    }
    this.privateKey = privateKey;
  }

  signDigest(digestAlgorithm: string, digest: Uint8Array): Uint8Array {
    const digestInfo = encodeDigestInfo(digestAlgorithm, digest);
    return new Uint8Array(
      privateEncrypt({ key: this.privateKey, padding: constants.RSA_PKCS1_PADDING }, digestInfo),
    );
  }
}

/**
 * Sign the document hash of a two-step session; returns a new session carrying the signature
 */
export function signTwoStepSession(session: TwoStepSession, signer: DigestSigner): TwoStepSession {
  const signatureValue = signer.signDigest(session.digestAlgorithm, session.digestValue);

  logDssp(
    dsspClientLogger.logFlowStep("info", "signer", "two-step", "sign", "Document hash signed locally", {
      correlationId: session.correlationId,
      digestAlgorithm: session.digestAlgorithm,
      signatureSize: signatureValue.length,
    }),
  );

  return { ...session, signatureValue };
}
