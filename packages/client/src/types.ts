/**
 * Client types that carry decoded certificates or keys
 */

import type {
  PendingRequest,
  SignRequest,
  SignResponse,
  TwoStepSessionOf,
  VerifyRequest,
  VerifyResponse,
} from "@dssp-client/shared";
import type { KeyObject } from "node:crypto";
import type { Certificate } from "pkijs";
import type { CertificateLookup } from "./services/certificate-store";

// ─────────── Credentials ───────────

export interface ClientCertificate {
  certificate: Certificate;
  privateKey?: KeyObject;
}

/** How the application authenticates itself; exactly one mode */
export type ApplicationCredentials =
  | { kind: "none" }
  | { kind: "usernamePassword"; username: string; password: string }
  | { kind: "clientCertificate"; clientCertificate: ClientCertificate }
  | { kind: "clientCertificateLookup"; lookup: CertificateLookup };

/**
 * Signs a precomputed document hash with the signer's private key
 */
export interface DigestSigner {
  /** @param digestAlgorithm XML-DSig digest method URI of `digest` */
  signDigest(digestAlgorithm: string, digest: Uint8Array): Uint8Array;
}

/** Signer for two-step signing: the chain (leaf first) and the leaf's key */
export interface SignerChain {
  certificates: Certificate[];
  key?: DigestSigner;
}

// ─────────── Sessions & verification ───────────

export type TwoStepSession = TwoStepSessionOf<Certificate>;

export interface SignatureInfo {
  signingTime: Date;
  signer: Certificate;
  /** Subject as rendered by the service (SERIALNUMBER, GIVENNAME, SURNAME, ...) */
  signerSubject: string;
  /** Subject rendered from the decoded certificate (SERIALNUMBER, G, SN, ...) */
  signerCertificateSubject: string;
  signerRole: string | null;
  signatureProductionPlace: string | null;
}

export interface SecurityInfo {
  /** Instant before which the document's timestamps must be renewed */
  timeStampValidity: Date;
  signatures: SignatureInfo[];
}

// ─────────── Channels ───────────

/** Security configuration a channel is built with */
export type ChannelBinding =
  | { mode: "anonymous" }
  | { mode: "clientCertificate"; clientCertificate: ClientCertificate }
  | { mode: "clientCertificateLookup"; lookup: CertificateLookup; certificate?: Certificate }
  | { mode: "usernamePassword"; username: string; password: string }
  | { mode: "secureConversation"; keyId: string; keyValue: Uint8Array };

/**
 * Secured request/response exchange with the service. Each operation exists
 * in a blocking and an awaited form.
 */
export interface DsspChannel {
  sign(request: SignRequest): SignResponse;
  signAsync(request: SignRequest): Promise<SignResponse>;
  pendingRequest(request: PendingRequest): SignResponse;
  pendingRequestAsync(request: PendingRequest): Promise<SignResponse>;
  verify(request: VerifyRequest): VerifyResponse;
  verifyAsync(request: VerifyRequest): Promise<VerifyResponse>;
}

export type ChannelFactory = (address: string, binding: ChannelBinding) => DsspChannel;
