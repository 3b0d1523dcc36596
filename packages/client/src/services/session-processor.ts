/**
 * Session/Result Processor
 *
 * Validates each response against the result its flow expects, then pulls out
 * what the caller needs: a session, the signed document or the verification
 * outcome. A response with the right result but without the fields its flow
 * relies on is a contract violation.
 */

import { RESULT_MAJOR, RESULT_MINOR } from "@dssp-client/shared";

import { DsspContractError } from "../errors";
import { dsspClientLogger } from "../logger";

import { deriveKey } from "./derived-key";
import { validateResult } from "./result-validator";
import { mapVerificationReport } from "./verification-report-mapper";

import type {
  AsyncSession,
  DsspDocument,
  LogEntry,
  SignResponse,
  VerifyResponse,
} from "@dssp-client/shared";
import type { SecurityInfo, TwoStepSession } from "../types";
import type { Certificate } from "pkijs";

/**
 * Upload leg of BROWSER/POST signing: expects Pending and a security context token
 */
export function processAsyncSignResponse(
  response: SignResponse,
  clientNonce: Uint8Array,
  logs?: LogEntry[],
): AsyncSession {
  validateResult(response, RESULT_MAJOR.PENDING, undefined, logs);

  const outputs = response.optionalOutputs;
  const serverId = outputs?.responseId;
  if (!serverId) {
    throw new DsspContractError("Pending response has no response id", "responseId");
  }

  const [token] = outputs?.requestSecurityTokenResponseCollection?.requestSecurityTokenResponse ?? [];
  if (!token) {
    throw new DsspContractError(
      "Pending response has no security token response",
      "requestSecurityTokenResponse",
    );
  }

  const secret = token.entropy?.binarySecret.value;
  if (!secret || secret.length === 0) {
    throw new DsspContractError("Security token response carries no server entropy", "entropy");
  }
  const keySize = token.keySize;
  if (keySize === undefined || !Number.isInteger(keySize) || keySize <= 0 || keySize % 8 !== 0) {
    throw new DsspContractError(
      `Security token response has no usable key size: ${String(keySize)}`,
      "keySize",
    );
  }
  const keyId = token.requestedSecurityToken?.securityContextToken.identifier;
  if (!keyId) {
    throw new DsspContractError(
      "Security token response has no context token identifier",
      "requestedSecurityToken",
    );
  }
  const reference = token.requestedUnattachedReference?.securityTokenReference.reference;
  if (!reference) {
    throw new DsspContractError(
      "Security token response has no unattached reference",
      "requestedUnattachedReference",
    );
  }
  const expires = token.lifetime?.expires;
  if (!expires) {
    throw new DsspContractError("Security token response has no expiry", "lifetime");
  }

  const session: AsyncSession = {
    kind: "async",
    serverId,
    keyId,
    keyValue: new Uint8Array(deriveKey(clientNonce, secret, keySize)),
    keyReference: { reference: { ...reference } },
    expiresOn: new Date(expires.getTime()),
  };

  logs?.push(
    dsspClientLogger.logFlowStep("info", "session", "async-sign", "extract", "Secure conversation established", {
      responseId: session.serverId,
      keyId: session.keyId,
      keySize,
      expiresOn: session.expiresOn.toISOString(),
    }),
  );

  return session;
}

/**
 * Upload leg of two-step signing: expects Success/documentHash, a correlation id
 * and the document hash to sign
 */
export function processTwoStepSignResponse(
  response: SignResponse,
  signer: Certificate,
  logs?: LogEntry[],
): TwoStepSession {
  validateResult(response, RESULT_MAJOR.SUCCESS, RESULT_MINOR.DOCUMENT_HASH, logs);

  const outputs = response.optionalOutputs;
  const correlationId = outputs?.correlationId;
  if (!correlationId) {
    throw new DsspContractError("Document hash response has no correlation id", "correlationId");
  }
  const digestValue = outputs?.documentHash?.digestValue;
  if (!digestValue || digestValue.length === 0) {
    throw new DsspContractError("Document hash response carries no document hash", "documentHash");
  }
  const digestAlgorithm = outputs?.documentHash?.digestMethod?.algorithm;
  if (!digestAlgorithm) {
    throw new DsspContractError("Document hash response names no digest method", "digestMethod");
  }

  logs?.push(
    dsspClientLogger.logFlowStep("info", "session", "two-step", "extract", "Document hash received", {
      correlationId,
      digestAlgorithm,
    }),
  );

  return {
    kind: "twoStep",
    signer,
    correlationId,
    digestAlgorithm,
    digestValue: new Uint8Array(digestValue),
  };
}

/**
 * Seal and download responses: exactly one signed document
 */
export function processSignedDocumentResponse(
  response: SignResponse,
  logs?: LogEntry[],
): DsspDocument {
  validateResult(response, RESULT_MAJOR.SUCCESS, undefined, logs);

  const documents = response.optionalOutputs?.documentWithSignature ?? [];
  const [signed] = documents;
  if (!signed || documents.length > 1) {
    throw new DsspContractError(
      `Expected exactly one signed document, got ${documents.length.toString()}`,
      "documentWithSignature",
    );
  }

  const { document } = signed;
  logs?.push(
    dsspClientLogger.createLogEntry("success", "session", "Signed document received", {
      step: "extract",
      documentId: document.id,
      size: document.base64Data.value.length,
    }),
  );

  return {
    id: document.id,
    mimeType: document.base64Data.mimeType,
    content: new Uint8Array(document.base64Data.value),
  };
}

/**
 * Verify response: null when the document carries no signature
 */
export function processVerifyResponse(
  response: VerifyResponse,
  logs?: LogEntry[],
): SecurityInfo | null {
  validateResult(response, RESULT_MAJOR.SUCCESS, undefined, logs);

  const outputs = response.optionalOutputs;
  return mapVerificationReport(outputs?.verificationReport, outputs?.timeStampRenewal?.before, logs);
}
