/**
 * Channel Selector
 *
 * Picks the security binding for each call and asks the factory for a fresh
 * channel. Bindings are rebuilt every time so no channel outlives its call.
 */

import { DsspPreconditionError } from "../errors";
import { dsspClientLogger } from "../logger";

import { subjectOf } from "./distinguished-name";

import type { AsyncSession, LogEntry } from "@dssp-client/shared";
import type {
  ApplicationCredentials,
  ChannelBinding,
  ChannelFactory,
  ClientCertificate,
  DsspChannel,
} from "../types";
import type { CertificateLookup, CertificateStore } from "./certificate-store";

/**
 * Flat application settings as they come from configuration files or the
 * environment; several may be set at once.
 */
export interface ApplicationSettings {
  applicationName?: string;
  applicationPassword?: string;
  clientCertificate?: ClientCertificate;
  certificateLookup?: CertificateLookup;
}

/**
 * Collapse flat settings into one credentials value.
 * No password and no certificate means anonymous; an inline certificate wins
 * over a lookup, which wins over username/password.
 */
export function toApplicationCredentials(settings: ApplicationSettings): ApplicationCredentials {
  const { applicationName, applicationPassword, clientCertificate, certificateLookup } = settings;

  if (clientCertificate) return { kind: "clientCertificate", clientCertificate };
  if (certificateLookup) return { kind: "clientCertificateLookup", lookup: certificateLookup };
  if (!applicationPassword) return { kind: "none" };
  return { kind: "usernamePassword", username: applicationName ?? "", password: applicationPassword };
}

/**
 * Frozen copy of the credentials, nested certificate or lookup included, so
 * later changes to the caller's object never reach a binding
 */
export function freezeCredentials(credentials: ApplicationCredentials): ApplicationCredentials {
  switch (credentials.kind) {
    case "none":
      return Object.freeze({ kind: "none" });
    case "usernamePassword":
      return Object.freeze({
        kind: "usernamePassword",
        username: credentials.username,
        password: credentials.password,
      });
    case "clientCertificate":
      return Object.freeze({
        kind: "clientCertificate",
        clientCertificate: Object.freeze({ ...credentials.clientCertificate }),
      });
    case "clientCertificateLookup":
      return Object.freeze({
        kind: "clientCertificateLookup",
        lookup: Object.freeze({ ...credentials.lookup }),
      });
  }
}

export class ChannelSelector {
  private readonly address: string;
  private readonly credentials: ApplicationCredentials;
  private readonly factory: ChannelFactory;
  private readonly certificateStore?: CertificateStore;

  constructor(
    address: string,
    credentials: ApplicationCredentials,
    factory: ChannelFactory,
    certificateStore?: CertificateStore,
  ) {
    if (!address) throw new DsspPreconditionError("A service address is required", "address");
    this.address = address;
    this.credentials = freezeCredentials(credentials);
    this.factory = factory;
    if (certificateStore) this.certificateStore = certificateStore;
  }

  /** Channel authenticated as the application */
  forApplication(logs?: LogEntry[]): DsspChannel {
    return this.open(this.applicationBinding(), logs);
  }

  /**
   * Channel secured with an async session's derived key; used only to
   * download a BROWSER/POST signed document
   */
  forSession(session: AsyncSession, logs?: LogEntry[]): DsspChannel {
    if (!session.keyId || session.keyValue.length === 0) {
      throw new DsspPreconditionError("The session holds no secure conversation key", "session");
    }
    return this.open(
      {
        mode: "secureConversation",
        keyId: session.keyId,
        keyValue: new Uint8Array(session.keyValue),
      },
      logs,
    );
  }

  private applicationBinding(): ChannelBinding {
    const credentials = this.credentials;
    switch (credentials.kind) {
      case "none":
        return { mode: "anonymous" };
      case "usernamePassword":
        return {
          mode: "usernamePassword",
          username: credentials.username,
          password: credentials.password,
        };
      case "clientCertificate":
        return { mode: "clientCertificate", clientCertificate: { ...credentials.clientCertificate } };
      case "clientCertificateLookup":
        return this.lookupBinding(credentials.lookup);
    }
  }

  private lookupBinding(lookup: CertificateLookup): ChannelBinding {
    if (!this.certificateStore) {
      return { mode: "clientCertificateLookup", lookup: { ...lookup } };
    }
    const certificate = this.certificateStore.find(lookup);
    if (!certificate) {
      throw new DsspPreconditionError(
        `No certificate in ${lookup.storeLocation}/${lookup.storeName} matches ${lookup.findType} "${lookup.findValue}"`,
        "credentials",
      );
    }
    return { mode: "clientCertificateLookup", lookup: { ...lookup }, certificate };
  }

  private open(binding: ChannelBinding, logs?: LogEntry[]): DsspChannel {
    logs?.push(
      dsspClientLogger.createLogEntry("debug", "channel", "Opening channel", {
        step: "exchange",
        channelMode: binding.mode,
        ...(binding.mode === "secureConversation" ? { keyId: binding.keyId } : {}),
        ...(binding.mode === "clientCertificateLookup" && binding.certificate
          ? { certificateSubject: subjectOf(binding.certificate) }
          : {}),
      }),
    );
    return this.factory(this.address, binding);
  }
}
