/**
 * DSS-P client
 *
 * Runs the four flows against the service: BROWSER/POST signing (upload,
 * then download once the user signed), two-step local signing, eSeal and
 * verification. Every operation comes in a blocking and an awaited form;
 * both go through the same prepare and finish steps, so they validate,
 * extract and fail identically.
 */

import { loadClientSettings } from "./config";
import { DsspContractError, DsspPreconditionError, DsspResultError } from "./errors";
import { dsspClientLogger, flushDssp } from "./logger";
import { ChannelSelector, freezeCredentials } from "./services/channel-selector";
import { signTwoStepSession } from "./services/local-signer";
import {
  assertTwoStepSigner,
  createAsyncDownloadRequest,
  createAsyncSignRequest,
  createSealRequest,
  createTwoStepDownloadRequest,
  createTwoStepSignRequest,
  createVerifyRequest,
} from "./services/request-builder";
import {
  processAsyncSignResponse,
  processSignedDocumentResponse,
  processTwoStepSignResponse,
  processVerifyResponse,
} from "./services/session-processor";

import type {
  AsyncSession,
  DsspDocument,
  DsspFlow,
  LogEntry,
  ResponseBase,
  SignatureRequestProperties,
} from "@dssp-client/shared";
import type { CertificateChainBuilder } from "./services/certificate-chain-builder";
import type { CertificateStore } from "./services/certificate-store";
import type {
  ApplicationCredentials,
  ChannelFactory,
  DigestSigner,
  DsspChannel,
  SecurityInfo,
  SignerChain,
  TwoStepSession,
} from "./types";

export interface DsspClientOptions {
  /** Service endpoint handed to the channel factory */
  address: string;
  channelFactory: ChannelFactory;
  /** Defaults to anonymous */
  credentials?: ApplicationCredentials;
  /** Signature type URI; empty lets the service choose */
  signatureType?: string;
  /** Required for two-step signing */
  signer?: SignerChain;
  chainBuilder?: CertificateChainBuilder;
  certificateStore?: CertificateStore;
}

/** One round trip, ready to send: nothing left that can fail before the call */
interface PreparedCall<TResponse extends ResponseBase, TResult> {
  flow: DsspFlow;
  documentId?: string;
  channel: DsspChannel;
  send(channel: DsspChannel): TResponse;
  sendAsync(channel: DsspChannel): Promise<TResponse>;
  finish(response: TResponse): TResult;
}

export class DsspClient {
  readonly options: Readonly<DsspClientOptions>;
  private readonly selector: ChannelSelector;

  constructor(options: DsspClientOptions) {
    this.options = Object.freeze({
      ...options,
      credentials: freezeCredentials(options.credentials ?? { kind: "none" }),
      signer: options.signer
        ? Object.freeze({ ...options.signer, certificates: [...options.signer.certificates] })
        : undefined,
    });
    this.selector = new ChannelSelector(
      this.options.address,
      this.options.credentials ?? { kind: "none" },
      this.options.channelFactory,
      this.options.certificateStore,
    );
  }

  /**
   * Client configured from DSSP_* environment variables
   */
  static fromEnvironment(
    channelFactory: ChannelFactory,
    extras: Pick<DsspClientOptions, "signer" | "certificateStore"> = {},
    env: Record<string, string | undefined> = process.env,
  ): DsspClient {
    const settings = loadClientSettings(env);
    return new DsspClient({ ...settings, ...extras, channelFactory });
  }

  // ─────────── BROWSER/POST signing ───────────

  /**
   * Upload a document for signing in the browser; the returned session is
   * needed for the download
   */
  uploadDocument(document: DsspDocument, properties?: SignatureRequestProperties): AsyncSession {
    return this.run((logs) => this.prepareUpload(document, properties, logs));
  }

  uploadDocumentAsync(
    document: DsspDocument,
    properties?: SignatureRequestProperties,
  ): Promise<AsyncSession> {
    return this.runAsync((logs) => this.prepareUpload(document, properties, logs));
  }

  // ─────────── Two-step signing ───────────

  /**
   * Upload a document for local signing with the configured signer; the
   * session carries the document hash to sign
   */
  uploadDocumentForTwoStep(
    document: DsspDocument,
    properties?: SignatureRequestProperties,
  ): TwoStepSession {
    return this.run((logs) => this.prepareTwoStepUpload(document, properties, logs));
  }

  uploadDocumentForTwoStepAsync(
    document: DsspDocument,
    properties?: SignatureRequestProperties,
  ): Promise<TwoStepSession> {
    return this.runAsync((logs) => this.prepareTwoStepUpload(document, properties, logs));
  }

  /** Sign the session's document hash, by default with the configured signer's key */
  signTwoStepSession(session: TwoStepSession, signer?: DigestSigner): TwoStepSession {
    const key = signer ?? this.options.signer?.key;
    if (!key) {
      throw new DsspPreconditionError("No key available to sign the document hash", "signer");
    }
    return signTwoStepSession(session, key);
  }

  // ─────────── Download ───────────

  /**
   * Fetch the signed document for either kind of session
   */
  downloadDocument(session: AsyncSession | TwoStepSession): DsspDocument {
    return this.run((logs) => this.prepareDownload(session, logs));
  }

  downloadDocumentAsync(session: AsyncSession | TwoStepSession): Promise<DsspDocument> {
    return this.runAsync((logs) => this.prepareDownload(session, logs));
  }

  // ─────────── eSeal ───────────

  seal(document: DsspDocument, properties?: SignatureRequestProperties): DsspDocument {
    return this.run((logs) => this.prepareSeal(document, properties, logs));
  }

  sealAsync(document: DsspDocument, properties?: SignatureRequestProperties): Promise<DsspDocument> {
    return this.runAsync((logs) => this.prepareSeal(document, properties, logs));
  }

  // ─────────── Verification ───────────

  /**
   * Verify a signed document; null when it carries no signature
   */
  verify(document: DsspDocument): SecurityInfo | null {
    return this.run((logs) => this.prepareVerify(document, logs));
  }

  verifyAsync(document: DsspDocument): Promise<SecurityInfo | null> {
    return this.runAsync((logs) => this.prepareVerify(document, logs));
  }

  // ─────────── Preparation ───────────

  private prepareUpload(
    document: DsspDocument,
    properties: SignatureRequestProperties | undefined,
    logs: LogEntry[],
  ): PreparedCall<ResponseBase, AsyncSession> {
    const { request, documentId, clientNonce } = createAsyncSignRequest(document, {
      signatureType: this.options.signatureType,
      properties,
    });
    return {
      flow: "async-sign",
      documentId,
      channel: this.selector.forApplication(logs),
      send: (channel) => channel.sign(request),
      sendAsync: (channel) => channel.signAsync(request),
      finish: (response) => processAsyncSignResponse(response, clientNonce, logs),
    };
  }

  private prepareTwoStepUpload(
    document: DsspDocument,
    properties: SignatureRequestProperties | undefined,
    logs: LogEntry[],
  ): PreparedCall<ResponseBase, TwoStepSession> {
    const signer = this.options.signer;
    assertTwoStepSigner(signer);
    const [leaf] = signer.certificates;

    const { request, documentId } = createTwoStepSignRequest(
      document,
      signer,
      { signatureType: this.options.signatureType, properties, chainBuilder: this.options.chainBuilder },
      logs,
    );
    return {
      flow: "two-step",
      documentId,
      channel: this.selector.forApplication(logs),
      send: (channel) => channel.sign(request),
      sendAsync: (channel) => channel.signAsync(request),
      finish: (response) => processTwoStepSignResponse(response, leaf, logs),
    };
  }

  private prepareDownload(
    session: AsyncSession | TwoStepSession,
    logs: LogEntry[],
  ): PreparedCall<ResponseBase, DsspDocument> {
    if (!session) throw new DsspPreconditionError("A session is required", "session");

    switch (session.kind) {
      case "async": {
        const request = createAsyncDownloadRequest(session);
        return {
          flow: "async-sign",
          channel: this.selector.forSession(session, logs),
          send: (channel) => channel.pendingRequest(request),
          sendAsync: (channel) => channel.pendingRequestAsync(request),
          finish: (response) => processSignedDocumentResponse(response, logs),
        };
      }
      case "twoStep": {
        const request = createTwoStepDownloadRequest(session, {
          signatureType: this.options.signatureType,
        });
        return {
          flow: "two-step",
          channel: this.selector.forApplication(logs),
          send: (channel) => channel.sign(request),
          sendAsync: (channel) => channel.signAsync(request),
          finish: (response) => processSignedDocumentResponse(response, logs),
        };
      }
    }
  }

  private prepareSeal(
    document: DsspDocument,
    properties: SignatureRequestProperties | undefined,
    logs: LogEntry[],
  ): PreparedCall<ResponseBase, DsspDocument> {
    const { request, documentId } = createSealRequest(document, {
      signatureType: this.options.signatureType,
      properties,
    });
    return {
      flow: "seal",
      documentId,
      channel: this.selector.forApplication(logs),
      send: (channel) => channel.sign(request),
      sendAsync: (channel) => channel.signAsync(request),
      finish: (response) => processSignedDocumentResponse(response, logs),
    };
  }

  private prepareVerify(
    document: DsspDocument,
    logs: LogEntry[],
  ): PreparedCall<ResponseBase, SecurityInfo | null> {
    const { request, documentId } = createVerifyRequest(document);
    return {
      flow: "verify",
      documentId,
      channel: this.selector.forApplication(logs),
      send: (channel) => channel.verify(request),
      sendAsync: (channel) => channel.verifyAsync(request),
      finish: (response) => processVerifyResponse(response, logs),
    };
  }

  // ─────────── Execution ───────────

  private run<TResponse extends ResponseBase, TResult>(
    prepare: (logs: LogEntry[]) => PreparedCall<TResponse, TResult>,
  ): TResult {
    const logs: LogEntry[] = [];
    const start = Date.now();
    let call: PreparedCall<TResponse, TResult> | undefined;
    try {
      call = prepare(logs);
      const result = call.finish(call.send(call.channel));
      this.completed(call, start, logs);
      return result;
    } catch (error) {
      this.failed(call, error, logs);
      throw error;
    } finally {
      flushDssp(logs);
    }
  }

  private async runAsync<TResponse extends ResponseBase, TResult>(
    prepare: (logs: LogEntry[]) => PreparedCall<TResponse, TResult>,
  ): Promise<TResult> {
    const logs: LogEntry[] = [];
    const start = Date.now();
    let call: PreparedCall<TResponse, TResult> | undefined;
    try {
      call = prepare(logs);
      const result = call.finish(await call.sendAsync(call.channel));
      this.completed(call, start, logs);
      return result;
    } catch (error) {
      this.failed(call, error, logs);
      throw error;
    } finally {
      flushDssp(logs);
    }
  }

  private completed<TResponse extends ResponseBase, TResult>(
    call: PreparedCall<TResponse, TResult>,
    start: number,
    logs: LogEntry[],
  ): void {
    logs.push(
      dsspClientLogger.logTiming("success", "client", `${call.flow} call`, Date.now() - start, {
        flow: call.flow,
        documentId: call.documentId,
      }),
    );
  }

  private failed<TResponse extends ResponseBase, TResult>(
    call: PreparedCall<TResponse, TResult> | undefined,
    error: unknown,
    logs: LogEntry[],
  ): void {
    const info =
      error instanceof DsspPreconditionError ||
      error instanceof DsspResultError ||
      error instanceof DsspContractError
        ? error.toErrorInfo()
        : undefined;
    logs.push(
      dsspClientLogger.createLogEntry(
        "error",
        "client",
        error instanceof Error ? error.message : String(error),
        {
          flow: call?.flow,
          documentId: call?.documentId,
          code: info?.code,
          // "prepare": nothing was sent
          stage: call ? "exchange" : "prepare",
        },
      ),
    );
  }
}
