/**
 * Certificate store lookup for application authentication by a stored certificate
 */

import { certificateSerialNumber, certificateThumbprint } from "./crypto-utils";
import { subjectOf } from "./distinguished-name";

import type { Certificate } from "pkijs";

export type StoreLocation = "CurrentUser" | "LocalMachine";

export type FindType = "thumbprint" | "subjectName" | "serialNumber";

/** Where to find the application certificate and how to pick it */
export interface CertificateLookup {
  storeLocation: StoreLocation;
  storeName: string;
  findType: FindType;
  findValue: string;
}

export interface CertificateStore {
  find(lookup: CertificateLookup): Certificate | undefined;
}

const normalizeHex = (value: string): string => value.replace(/[\s:]/g, "").toUpperCase();

function matches(cert: Certificate, findType: FindType, findValue: string): boolean {
  switch (findType) {
    case "thumbprint":
      return certificateThumbprint(cert) === normalizeHex(findValue);
    case "serialNumber":
      return certificateSerialNumber(cert) === normalizeHex(findValue);
    case "subjectName":
      return subjectOf(cert).toLowerCase().includes(findValue.toLowerCase());
  }
}

/**
 * Store backed by certificates loaded in memory, grouped by location and name
 */
export class MemoryCertificateStore implements CertificateStore {
  private readonly stores = new Map<string, Certificate[]>();

  add(location: StoreLocation, storeName: string, certificates: Certificate[]): this {
    const key = `${location}/${storeName.toLowerCase()}`;
    this.stores.set(key, [...(this.stores.get(key) ?? []), ...certificates]);
    return this;
  }

  find(lookup: CertificateLookup): Certificate | undefined {
    const certificates = this.stores.get(`${lookup.storeLocation}/${lookup.storeName.toLowerCase()}`);
    return certificates?.find((cert) => matches(cert, lookup.findType, lookup.findValue));
  }
}
