/**
 * Session values handed to the caller between upload and download.
 *
 * Every field comes from a validated service response; the caller stores the
 * value as-is and passes it back on download.
 */

import type { SecurityTokenReference } from "./protocol";

export interface AsyncSession {
  kind: "async";
  /** Server correlation id (ResponseID) */
  serverId: string;
  /** Security context token identifier */
  keyId: string;
  /** Derived symmetric key securing the download */
  keyValue: Uint8Array;
  /** Unattached token reference, echoed back unmodified */
  keyReference: SecurityTokenReference;
  expiresOn: Date;
}

/**
 * Two-step session, parameterised over the certificate type so the shared
 * package stays free of an X.509 library.
 */
export interface TwoStepSessionOf<TCertificate> {
  kind: "twoStep";
  signer: TCertificate;
  correlationId: string;
  /** XML-DSig digest method URI */
  digestAlgorithm: string;
  /** The hash the caller signs locally */
  digestValue: Uint8Array;
  /** Set once the digest has been signed locally */
  signatureValue?: Uint8Array;
}
