/**
 * DSS-P protocol constants
 */

export const PROFILES = {
  DSSP: "urn:be:e-contract:dssp:1.0",
  ESEAL: "urn:be:e-contract:dssp:eseal:1.0",
  LOCAL_SIGNATURE: "http://docs.oasis-open.org/dss-x/ns/localsig",
  ASYNCHRONOUS_PROCESSING: "urn:oasis:names:tc:dss:1.0:profiles:asynchronousprocessing",
} as const;

export const POLICIES = {
  TWO_STEP: "http://docs.oasis-open.org/dss-x/ns/localsig/two-step-approach",
} as const;

export const WS_TRUST = {
  SECURE_CONVERSATION_TOKEN: "http://docs.oasis-open.org/ws-sx/ws-secureconversation/200512/sct",
  ISSUE: "http://docs.oasis-open.org/ws-sx/ws-trust/200512/Issue",
  CANCEL: "http://docs.oasis-open.org/ws-sx/ws-trust/200512/Cancel",
  NONCE: "http://docs.oasis-open.org/ws-sx/ws-trust/200512/Nonce",
} as const;

export const RESULT_MAJOR = {
  SUCCESS: "urn:oasis:names:tc:dss:1.0:resultmajor:Success",
  PENDING: "urn:oasis:names:tc:dss:1.0:profiles:asynchronousprocessing:resultmajor:Pending",
  REQUESTER_ERROR: "urn:oasis:names:tc:dss:1.0:resultmajor:RequesterError",
  RESPONDER_ERROR: "urn:oasis:names:tc:dss:1.0:resultmajor:ResponderError",
} as const;

export const RESULT_MINOR = {
  DOCUMENT_HASH: "urn:oasis:names:tc:dss:1.0:resultminor:documentHash",
} as const;

/** XML-DSig digest method URIs the service may return for a two-step document hash */
export const DIGEST_METHODS = {
  SHA1: "http://www.w3.org/2000/09/xmldsig#sha1",
  SHA256: "http://www.w3.org/2001/04/xmlenc#sha256",
  SHA384: "http://www.w3.org/2001/04/xmldsig-more#sha384",
  SHA512: "http://www.w3.org/2001/04/xmlenc#sha512",
} as const;

export const DEFAULT_CONFIG = {
  /** Client entropy sent with an async sign request, in bytes */
  CLIENT_NONCE_SIZE: 32,
  DOCUMENT_ID_PREFIX: "doc-",
  MAX_CHAIN_LENGTH: 10,
} as const;

/** Largest instant a Date can hold; stands for "no timestamp renewal needed" */
export const UNBOUNDED_TIME_MS = 8_640_000_000_000_000;
