// config.ts
import { readFileSync } from "node:fs";

import { DsspPreconditionError } from "./errors";
import { TrustStoreChainBuilder } from "./services/certificate-chain-builder";
import { parseCertificatePem, splitPemBundle } from "./services/crypto-utils";
import { toApplicationCredentials } from "./services/channel-selector";

import type { ApplicationCredentials } from "./types";
import type { CertificateChainBuilder } from "./services/certificate-chain-builder";
import type { CertificateLookup, FindType, StoreLocation } from "./services/certificate-store";
import type { Certificate } from "pkijs";

export interface ClientSettings {
  address: string;
  signatureType?: string;
  credentials: ApplicationCredentials;
  chainBuilder?: CertificateChainBuilder;
}

type Env = Record<string, string | undefined>;

const STORE_LOCATIONS: readonly StoreLocation[] = ["CurrentUser", "LocalMachine"];
const FIND_TYPES: readonly FindType[] = ["thumbprint", "subjectName", "serialNumber"];

const isStoreLocation = (value: string): value is StoreLocation =>
  STORE_LOCATIONS.some((location) => location === value);

const isFindType = (value: string): value is FindType => FIND_TYPES.some((type) => type === value);

const read = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim();
  return value ? value : undefined;
};

/**
 * Load certificates from a PEM bundle; every block must be a certificate
 */
export function loadTrustBundle(path: string): Certificate[] {
  let bundle: string;
  try {
    bundle = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DsspPreconditionError(`Cannot read trust bundle ${path}: ${reason}`, "DSSP_TRUST_BUNDLE");
  }

  const blocks = splitPemBundle(bundle);
  if (blocks.length === 0) {
    throw new DsspPreconditionError(`Trust bundle ${path} holds no PEM certificate`, "DSSP_TRUST_BUNDLE");
  }

  return blocks.map((pem, index) => {
    const cert = parseCertificatePem(pem);
    if (!cert) {
      throw new DsspPreconditionError(
        `Trust bundle ${path}: block ${index.toString()} is not a certificate`,
        "DSSP_TRUST_BUNDLE",
      );
    }
    return cert;
  });
}

/**
 * Client settings from the environment (.env is loaded by the logger module)
 */
export function loadClientSettings(env: Env = process.env): ClientSettings {
  const address = read(env, "DSSP_ADDRESS");
  if (!address) {
    throw new DsspPreconditionError("DSSP_ADDRESS is not set", "DSSP_ADDRESS");
  }

  const findValue = read(env, "DSSP_CERT_FIND_VALUE");
  let certificateLookup: CertificateLookup | undefined;
  if (findValue) {
    const storeLocation = read(env, "DSSP_CERT_STORE_LOCATION") ?? "CurrentUser";
    const findType = read(env, "DSSP_CERT_FIND_TYPE") ?? "thumbprint";
    if (!isStoreLocation(storeLocation)) {
      throw new DsspPreconditionError(
        `DSSP_CERT_STORE_LOCATION must be one of ${STORE_LOCATIONS.join(", ")}`,
        "DSSP_CERT_STORE_LOCATION",
      );
    }
    if (!isFindType(findType)) {
      throw new DsspPreconditionError(
        `DSSP_CERT_FIND_TYPE must be one of ${FIND_TYPES.join(", ")}`,
        "DSSP_CERT_FIND_TYPE",
      );
    }
    certificateLookup = {
      storeLocation,
      storeName: read(env, "DSSP_CERT_STORE_NAME") ?? "My",
      findType,
      findValue,
    };
  }

  const trustBundle = read(env, "DSSP_TRUST_BUNDLE");

  return {
    address,
    signatureType: read(env, "DSSP_SIGNATURE_TYPE"),
    credentials: toApplicationCredentials({
      applicationName: read(env, "DSSP_APPLICATION_NAME"),
      applicationPassword: read(env, "DSSP_APPLICATION_PASSWORD"),
      certificateLookup,
    }),
    chainBuilder: trustBundle ? new TrustStoreChainBuilder(loadTrustBundle(trustBundle)) : undefined,
  };
}
