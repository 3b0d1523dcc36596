/**
 * Request Builder
 *
 * One construction function per flow. Every request gets a fresh document id
 * and an enveloped signature placed in that document.
 */
import { randomBytes, randomUUID } from "node:crypto";

import { DEFAULT_CONFIG, POLICIES, PROFILES, WS_TRUST } from "@dssp-client/shared";

import { DsspPreconditionError } from "../errors";
import { dsspClientLogger } from "../logger";

import { certificateToDer } from "./crypto-utils";
import { isSelfIssued, subjectOf } from "./distinguished-name";

import type {
  AsyncSession,
  DocumentType,
  DsspDocument,
  LogEntry,
  PendingRequest,
  SignRequest,
  SignatureProperties,
  SignaturePlacement,
  SignatureRequestProperties,
  VerifyRequest,
} from "@dssp-client/shared";
import type { DigestSigner, SignerChain, TwoStepSession } from "../types";
import type { CertificateChainBuilder } from "./certificate-chain-builder";

export interface RequestOptions {
  /** Signature type URI; empty lets the service choose */
  signatureType?: string;
  properties?: SignatureRequestProperties;
}

export interface TwoStepRequestOptions extends RequestOptions {
  chainBuilder?: CertificateChainBuilder;
}

export interface BuiltRequest<TRequest> {
  request: TRequest;
  documentId: string;
}

export interface BuiltAsyncSignRequest extends BuiltRequest<SignRequest> {
  /** Client entropy; needed again to derive the session key from the response */
  clientNonce: Buffer;
}

// ─────────── Preconditions ───────────

export function assertDocument(
  document: DsspDocument | null | undefined,
): asserts document is DsspDocument {
  if (!document) throw new DsspPreconditionError("A document is required", "document");
  if (!document.mimeType) {
    throw new DsspPreconditionError("The document has no MIME type", "document");
  }
  if (!(document.content instanceof Uint8Array)) {
    throw new DsspPreconditionError("The document has no content", "document");
  }
}

export function assertTwoStepSigner(
  signer: SignerChain | null | undefined,
): asserts signer is SignerChain & { key: DigestSigner } {
  if (!signer || signer.certificates.length === 0 || !signer.key) {
    throw new DsspPreconditionError(
      "A signer chain is required and its first (end) certificate must have a private key",
      "signer",
    );
  }
}

// ─────────── Building blocks ───────────

export function createDocumentId(): string {
  return `${DEFAULT_CONFIG.DOCUMENT_ID_PREFIX}${randomUUID()}`;
}

function createEnvelopedSignature(documentId: string): SignaturePlacement {
  return {
    whichDocument: documentId,
    createEnvelopedSignature: true,
  };
}

function createDocumentType(documentId: string, document: DsspDocument): DocumentType {
  return {
    id: documentId,
    base64Data: {
      mimeType: document.mimeType,
      // Copy: the request must not alias the caller's buffer
      value: new Uint8Array(document.content),
    },
  };
}

function signatureTypeOrDefault(signatureType: string | undefined): string | undefined {
  return signatureType ? signatureType : undefined;
}

function createSignatureProperties(
  properties: SignatureRequestProperties | undefined,
): SignatureProperties | undefined {
  if (!properties?.signerRole && !properties?.signatureProductionPlace) return undefined;
  return {
    signerRole: properties.signerRole || undefined,
    location: properties.signatureProductionPlace || undefined,
  };
}

/**
 * DER chain to embed for two-step signing, leaf first.
 * A single certificate that is not self-signed is completed from the trust store;
 * several certificates are taken as the full chain.
 */
export function resolveSignerChain(
  signer: SignerChain,
  chainBuilder: CertificateChainBuilder | undefined,
  logs?: LogEntry[],
): Uint8Array[] {
  const [leaf] = signer.certificates;
  if (signer.certificates.length === 1 && leaf && !isSelfIssued(leaf)) {
    if (chainBuilder) {
      return chainBuilder.buildChain(leaf, logs).map(certificateToDer);
    }
    logs?.push(
      dsspClientLogger.createLogEntry(
        "warning",
        "builder",
        "No chain builder configured, sending the end certificate only",
        { leafSubject: subjectOf(leaf) },
      ),
    );
  }
  return signer.certificates.map(certificateToDer);
}

// ─────────── Requests per flow ───────────

/**
 * Asynchronous (BROWSER/POST) signing: asks for a secure conversation token
 * seeded with fresh client entropy.
 */
export function createAsyncSignRequest(
  document: DsspDocument,
  options: RequestOptions = {},
): BuiltAsyncSignRequest {
  assertDocument(document);
  const documentId = createDocumentId();
  const clientNonce = randomBytes(DEFAULT_CONFIG.CLIENT_NONCE_SIZE);

  const request: SignRequest = {
    profile: PROFILES.DSSP,
    optionalInputs: {
      additionalProfile: PROFILES.ASYNCHRONOUS_PROCESSING,
      requestSecurityToken: {
        tokenType: WS_TRUST.SECURE_CONVERSATION_TOKEN,
        requestType: WS_TRUST.ISSUE,
        entropy: {
          binarySecret: {
            type: WS_TRUST.NONCE,
            value: new Uint8Array(clientNonce),
          },
        },
      },
      signatureType: signatureTypeOrDefault(options.signatureType),
      signaturePlacement: createEnvelopedSignature(documentId),
      signatureProperties: createSignatureProperties(options.properties),
    },
    inputDocuments: {
      document: [createDocumentType(documentId, document)],
    },
  };

  return { request, documentId, clientNonce };
}

/**
 * eSeal: the service signs synchronously with the key tied to the application
 */
export function createSealRequest(
  document: DsspDocument,
  options: RequestOptions = {},
): BuiltRequest<SignRequest> {
  assertDocument(document);
  const documentId = createDocumentId();

  const request: SignRequest = {
    profile: PROFILES.ESEAL,
    optionalInputs: {
      signatureType: signatureTypeOrDefault(options.signatureType),
      signaturePlacement: createEnvelopedSignature(documentId),
      signatureProperties: createSignatureProperties(options.properties),
    },
    inputDocuments: {
      document: [createDocumentType(documentId, document)],
    },
  };

  return { request, documentId };
}

/**
 * Two-step local signing, upload leg: the service keeps the document and
 * returns the hash to sign.
 */
export function createTwoStepSignRequest(
  document: DsspDocument,
  signer: SignerChain | undefined,
  options: TwoStepRequestOptions = {},
  logs?: LogEntry[],
): BuiltRequest<SignRequest> {
  assertDocument(document);
  assertTwoStepSigner(signer);
  const documentId = createDocumentId();

  const request: SignRequest = {
    profile: PROFILES.LOCAL_SIGNATURE,
    optionalInputs: {
      signatureType: signatureTypeOrDefault(options.signatureType),
      servicePolicy: POLICIES.TWO_STEP,
      signaturePlacement: createEnvelopedSignature(documentId),
      requestDocumentHash: {
        maintainRequestState: true,
      },
      keySelector: {
        keyInfo: {
          x509Data: resolveSignerChain(signer, options.chainBuilder, logs),
        },
      },
      signatureProperties: createSignatureProperties(options.properties),
    },
    inputDocuments: {
      document: [createDocumentType(documentId, document)],
    },
  };

  return { request, documentId };
}

/**
 * Download after BROWSER/POST signing; cancels the secure conversation token
 */
export function createAsyncDownloadRequest(session: AsyncSession): PendingRequest {
  if (!session) throw new DsspPreconditionError("A session is required", "session");

  return {
    optionalInputs: {
      additionalProfile: PROFILES.ASYNCHRONOUS_PROCESSING,
      responseId: session.serverId,
      requestSecurityToken: {
        requestType: WS_TRUST.CANCEL,
        cancelTarget: {
          securityTokenReference: {
            reference: {
              valueType: WS_TRUST.SECURE_CONVERSATION_TOKEN,
              uri: session.keyId,
            },
          },
        },
      },
    },
  };
}

/**
 * Two-step download leg: hands the locally computed signature to the service
 */
export function createTwoStepDownloadRequest(
  session: TwoStepSession,
  options: Pick<RequestOptions, "signatureType"> = {},
): SignRequest {
  if (!session) throw new DsspPreconditionError("A session is required", "session");
  if (!session.signatureValue) {
    throw new DsspPreconditionError("The session's document hash has not been signed yet", "session");
  }

  return {
    profile: PROFILES.LOCAL_SIGNATURE,
    optionalInputs: {
      signatureType: signatureTypeOrDefault(options.signatureType),
      servicePolicy: POLICIES.TWO_STEP,
      correlationId: session.correlationId,
      signatureObject: {
        base64Signature: {
          value: new Uint8Array(session.signatureValue),
        },
      },
    },
  };
}

/**
 * Verification with a report naming the verifier and including certificate values
 */
export function createVerifyRequest(document: DsspDocument): BuiltRequest<VerifyRequest> {
  assertDocument(document);
  const documentId = createDocumentId();

  const request: VerifyRequest = {
    profile: PROFILES.DSSP,
    optionalInputs: {
      returnVerificationReport: {
        includeVerifier: true,
        includeCertificateValues: true,
      },
    },
    inputDocuments: {
      document: [createDocumentType(documentId, document)],
    },
  };

  return { request, documentId };
}
