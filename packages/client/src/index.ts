export { DsspClient } from "./dssp-client";
export type { DsspClientOptions } from "./dssp-client";
export { loadClientSettings, loadTrustBundle } from "./config";
export type { ClientSettings } from "./config";
export { DsspContractError, DsspPreconditionError, DsspResultError } from "./errors";
export { logger, logDssp, flushDssp, dsspClientLogger, readLogSettings } from "./logger";
export type { ClientLogSettings } from "./logger";

export { deriveKey } from "./services/derived-key";
export * from "./services/request-builder";
export { ChannelSelector, toApplicationCredentials } from "./services/channel-selector";
export type { ApplicationSettings } from "./services/channel-selector";
export { validateResult } from "./services/result-validator";
export * from "./services/session-processor";
export { mapVerificationReport, parseSigningTime } from "./services/verification-report-mapper";
export { TrustStoreChainBuilder } from "./services/certificate-chain-builder";
export type { CertificateChainBuilder } from "./services/certificate-chain-builder";
export { MemoryCertificateStore } from "./services/certificate-store";
export type {
  CertificateLookup,
  CertificateStore,
  FindType,
  StoreLocation,
} from "./services/certificate-store";
export { RsaDigestSigner, encodeDigestInfo, signTwoStepSession } from "./services/local-signer";
export { formatName, issuerOf, subjectOf } from "./services/distinguished-name";
export {
  certificateThumbprint,
  derToPem,
  parseCertificate,
  parseCertificatePem,
} from "./services/crypto-utils";

export type * from "./types";
