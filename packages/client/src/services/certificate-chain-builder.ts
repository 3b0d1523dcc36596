/**
 * Certificate Chain Builder
 *
 * Completes a signer certificate into its full chain by looking up issuers in
 * a local set of trusted certificates (intermediates and roots).
 */

import { DEFAULT_CONFIG } from "@dssp-client/shared";

import { logDssp, dsspClientLogger } from "../logger";

import { certificateThumbprint } from "./crypto-utils";
import { isSelfIssued, nameKey, subjectOf } from "./distinguished-name";

import type { LogEntry } from "@dssp-client/shared";
import type { Certificate } from "pkijs";

/**
 * Local chain-building capability used for two-step signing
 */
export interface CertificateChainBuilder {
  /** Chain starting with `leaf`, as far as the issuers can be found */
  buildChain(leaf: Certificate, logs?: LogEntry[]): Certificate[];
}

/**
 * Builds chains by issuer-name lookup in an in-memory trust store
 */
export class TrustStoreChainBuilder implements CertificateChainBuilder {
  private readonly bySubject = new Map<string, Certificate[]>();
  private readonly maxChainLength: number;

  constructor(trusted: Certificate[], maxChainLength: number = DEFAULT_CONFIG.MAX_CHAIN_LENGTH) {
    this.maxChainLength = maxChainLength;
    for (const cert of trusted) {
      const key = nameKey(cert.subject);
      const existing = this.bySubject.get(key);
      if (existing) existing.push(cert);
      else this.bySubject.set(key, [cert]);
    }
  }

  get size(): number {
    let total = 0;
    for (const certs of this.bySubject.values()) total += certs.length;
    return total;
  }

  buildChain(leaf: Certificate, logs?: LogEntry[]): Certificate[] {
    const chain: Certificate[] = [leaf];
    const seen = new Set<string>([certificateThumbprint(leaf)]);

    logs?.push(
      dsspClientLogger.createLogEntry("debug", "signer", "Starting certificate chain building", {
        leafSubject: subjectOf(leaf),
        trustStoreSize: this.size,
        maxChainLength: this.maxChainLength,
      }),
    );

    let current = leaf;
    while (chain.length < this.maxChainLength) {
      if (isSelfIssued(current)) {
        logs?.push(
          dsspClientLogger.createLogEntry("debug", "signer", "Reached self-signed root", {
            chainLength: chain.length,
            rootSubject: subjectOf(current),
          }),
        );
        break;
      }

      const issuer = this.findIssuer(current, seen);
      if (!issuer) {
        const entry = dsspClientLogger.createLogEntry(
          "warning",
          "signer",
          "Issuer not found in trust store, chain is incomplete",
          { chainLength: chain.length, missingIssuer: nameKey(current.issuer) },
        );
        logs?.push(entry);
        logDssp(entry);
        break;
      }

      chain.push(issuer);
      seen.add(certificateThumbprint(issuer));
      current = issuer;
    }

    logs?.push(
      dsspClientLogger.createLogEntry("success", "signer", "Certificate chain building completed", {
        chainLength: chain.length,
      }),
    );

    return chain;
  }

  private findIssuer(cert: Certificate, seen: Set<string>): Certificate | undefined {
    const candidates = this.bySubject.get(nameKey(cert.issuer)) ?? [];
    return candidates.find((candidate) => !seen.has(certificateThumbprint(candidate)));
  }
}
