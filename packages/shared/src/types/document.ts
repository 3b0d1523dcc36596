/**
 * Document and signing-property types
 */

export interface DsspDocument {
  /** MIME type, e.g. "application/pdf" or "text/xml" */
  mimeType: string;
  content: Uint8Array;
  /** Identifier assigned by the service or the request that carried the document */
  id?: string;
}

/** Extra signature attributes the service embeds in the signature it creates */
export interface SignatureRequestProperties {
  signerRole?: string;
  signatureProductionPlace?: string;
}
