/**
 * DSS-P wire messages as typed structures.
 *
 * The channel owns the mapping to and from the XML schema; field names follow
 * the schema elements. Repeatable elements are arrays, optional ones optional.
 */

// ─────────── Shared building blocks ───────────

export interface DsspResult {
  resultMajor: string;
  resultMinor?: string;
  resultMessage?: {
    value: string;
    lang?: string;
  };
}

export interface Base64Data {
  mimeType: string;
  value: Uint8Array;
}

export interface DocumentType {
  id: string;
  base64Data: Base64Data;
}

export interface InputDocuments {
  document: DocumentType[];
}

export interface SignaturePlacement {
  /** Id of the input document the signature is placed in */
  whichDocument: string;
  createEnvelopedSignature: boolean;
}

export interface BinarySecret {
  type: string;
  value: Uint8Array;
}

export interface SecurityTokenReference {
  reference: {
    valueType: string;
    uri: string;
  };
}

/** WS-Trust RequestSecurityToken (Issue on upload, Cancel on download) */
export interface RequestSecurityToken {
  tokenType?: string;
  requestType: string;
  entropy?: {
    binarySecret: BinarySecret;
  };
  cancelTarget?: {
    securityTokenReference: SecurityTokenReference;
  };
}

export interface RequestDocumentHash {
  maintainRequestState: boolean;
}

export interface KeySelector {
  keyInfo: {
    /** DER certificates, leaf first */
    x509Data: Uint8Array[];
  };
}

export interface ReturnVerificationReport {
  includeVerifier: boolean;
  includeCertificateValues: boolean;
}

export interface SignatureObject {
  base64Signature: {
    value: Uint8Array;
  };
}

export interface SignatureProperties {
  signerRole?: string;
  location?: string;
}

export interface OptionalInputs {
  additionalProfile?: string;
  servicePolicy?: string;
  signatureType?: string;
  signaturePlacement?: SignaturePlacement;
  requestSecurityToken?: RequestSecurityToken;
  requestDocumentHash?: RequestDocumentHash;
  keySelector?: KeySelector;
  responseId?: string;
  correlationId?: string;
  signatureObject?: SignatureObject;
  returnVerificationReport?: ReturnVerificationReport;
  signatureProperties?: SignatureProperties;
}

// ─────────── Requests ───────────

export interface SignRequest {
  profile: string;
  optionalInputs: OptionalInputs;
  inputDocuments?: InputDocuments;
}

export interface PendingRequest {
  optionalInputs: OptionalInputs;
}

export interface VerifyRequest {
  profile: string;
  optionalInputs: OptionalInputs;
  inputDocuments: InputDocuments;
}

// ─────────── Responses ───────────

// Response elements the service may leave out are optional; the client checks
// the ones each flow depends on.

export interface RequestSecurityTokenResponse {
  tokenType?: string;
  requestedSecurityToken?: {
    securityContextToken: {
      identifier: string;
    };
  };
  requestedUnattachedReference?: {
    securityTokenReference: SecurityTokenReference;
  };
  entropy?: {
    binarySecret: BinarySecret;
  };
  /** Key size in bits */
  keySize?: number;
  lifetime?: {
    created?: Date;
    expires?: Date;
  };
}

export interface DocumentHash {
  digestMethod?: {
    algorithm: string;
  };
  digestValue?: Uint8Array;
}

export interface DocumentWithSignature {
  document: DocumentType;
}

export interface SignedSignatureProperties {
  /** Timestamp as written by the service (ISO-8601, offset optional) */
  signingTime: string;
  location?: string;
  signerRole?: {
    claimedRoles: string[];
  };
}

export interface CertificateValidity {
  /** Subject as rendered by the service */
  subject: string;
  /** DER encoded certificate */
  certificateValue: Uint8Array;
}

export interface IndividualReport {
  signedObjectIdentifier?: {
    signedProperties: {
      signedSignatureProperties: SignedSignatureProperties;
    };
  };
  result: DsspResult;
  details?: {
    detailedSignatureReport: {
      certificatePathValidity: {
        pathValidityDetail: {
          certificateValidity: CertificateValidity[];
        };
      };
    };
  };
}

export interface VerificationReport {
  individualReport?: IndividualReport[];
}

export interface OptionalOutputs {
  responseId?: string;
  correlationId?: string;
  requestSecurityTokenResponseCollection?: {
    requestSecurityTokenResponse: RequestSecurityTokenResponse[];
  };
  documentHash?: DocumentHash;
  documentWithSignature?: DocumentWithSignature[];
  verificationReport?: VerificationReport;
  timeStampRenewal?: {
    before: Date;
  };
}

export interface ResponseBase {
  profile?: string;
  result: DsspResult;
  optionalOutputs?: OptionalOutputs;
}

export type SignResponse = ResponseBase;
export type VerifyResponse = ResponseBase;
