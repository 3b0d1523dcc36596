import { POLICIES, PROFILES, WS_TRUST } from "@dssp-client/shared";
import { beforeAll, describe, expect, it } from "vitest";

import { DsspPreconditionError } from "../errors";
import { createMockPki } from "../test/mock-pki";

import { TrustStoreChainBuilder } from "./certificate-chain-builder";
import { certificateToDer } from "./crypto-utils";
import {
  createAsyncDownloadRequest,
  createAsyncSignRequest,
  createSealRequest,
  createTwoStepDownloadRequest,
  createTwoStepSignRequest,
  createVerifyRequest,
  resolveSignerChain,
} from "./request-builder";

import type { MockPki } from "../test/mock-pki";
import type { DigestSigner, TwoStepSession } from "../types";
import type { AsyncSession, DsspDocument, LogEntry } from "@dssp-client/shared";

const DOC_ID = /^doc-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

const stubKey: DigestSigner = { signDigest: () => new Uint8Array([1, 2, 3]) };

function xmlDocument(): DsspDocument {
  return { mimeType: "text/xml", content: Buffer.from("<doc>hello</doc>") };
}

describe("Request builder", () => {
  let pki: MockPki;

  beforeAll(async () => {
    pki = await createMockPki();
  });

  describe("createAsyncSignRequest", () => {
    it("should ask for a secure conversation token with fresh client entropy", () => {
      const { request, documentId, clientNonce } = createAsyncSignRequest(xmlDocument());

      expect(request.profile).toBe(PROFILES.DSSP);
      expect(request.optionalInputs.additionalProfile).toBe(PROFILES.ASYNCHRONOUS_PROCESSING);

      const rst = request.optionalInputs.requestSecurityToken;
      expect(rst?.tokenType).toBe(WS_TRUST.SECURE_CONVERSATION_TOKEN);
      expect(rst?.requestType).toBe(WS_TRUST.ISSUE);
      expect(rst?.entropy?.binarySecret.type).toBe(WS_TRUST.NONCE);
      expect(clientNonce).toHaveLength(32);
      expect(Buffer.from(rst?.entropy?.binarySecret.value ?? []).equals(clientNonce)).toBe(true);

      expect(documentId).toMatch(DOC_ID);
      expect(request.optionalInputs.signaturePlacement).toEqual({
        whichDocument: documentId,
        createEnvelopedSignature: true,
      });
      expect(request.inputDocuments?.document).toHaveLength(1);
      expect(request.inputDocuments?.document[0]?.id).toBe(documentId);
      expect(request.inputDocuments?.document[0]?.base64Data.mimeType).toBe("text/xml");
    });

    it("should use new ids and nonces on every call", () => {
      const first = createAsyncSignRequest(xmlDocument());
      const second = createAsyncSignRequest(xmlDocument());

      expect(first.documentId).not.toBe(second.documentId);
      expect(first.clientNonce.equals(second.clientNonce)).toBe(false);
    });

    it("should copy the document content", () => {
      const document = xmlDocument();
      const { request } = createAsyncSignRequest(document);
      document.content[0] = 0x00;

      const sent = request.inputDocuments?.document[0]?.base64Data.value;
      expect(Buffer.from(sent ?? []).toString()).toBe("<doc>hello</doc>");
    });

    it("should leave the signature type out when empty", () => {
      const { request } = createAsyncSignRequest(xmlDocument(), { signatureType: "" });

      expect(request.optionalInputs.signatureType).toBeUndefined();
      expect(request.optionalInputs.signatureProperties).toBeUndefined();
    });

    it("should carry signature type and properties", () => {
      const { request } = createAsyncSignRequest(xmlDocument(), {
        signatureType: "urn:be:e-contract:dssp:signature:xades-x-l",
        properties: { signerRole: "Zaakvoerder", signatureProductionPlace: "Denderleeuw" },
      });

      expect(request.optionalInputs.signatureType).toBe("urn:be:e-contract:dssp:signature:xades-x-l");
      expect(request.optionalInputs.signatureProperties).toEqual({
        signerRole: "Zaakvoerder",
        location: "Denderleeuw",
      });
    });

    it("should reject a document without MIME type", () => {
      expect(() => createAsyncSignRequest({ mimeType: "", content: new Uint8Array(1) })).toThrow(
        DsspPreconditionError,
      );
    });
  });

  describe("createSealRequest", () => {
    it("should use the eSeal profile without a token request", () => {
      const { request, documentId } = createSealRequest(xmlDocument());

      expect(request.profile).toBe(PROFILES.ESEAL);
      expect(request.optionalInputs.requestSecurityToken).toBeUndefined();
      expect(request.optionalInputs.additionalProfile).toBeUndefined();
      expect(request.optionalInputs.signaturePlacement?.whichDocument).toBe(documentId);
    });
  });

  describe("createTwoStepSignRequest", () => {
    it("should request the document hash with the embedded chain", () => {
      const { request, documentId } = createTwoStepSignRequest(xmlDocument(), {
        certificates: [pki.signer, pki.intermediate],
        key: stubKey,
      });

      expect(request.profile).toBe(PROFILES.LOCAL_SIGNATURE);
      expect(request.optionalInputs.servicePolicy).toBe(POLICIES.TWO_STEP);
      expect(request.optionalInputs.requestDocumentHash).toEqual({ maintainRequestState: true });
      expect(request.optionalInputs.signaturePlacement?.whichDocument).toBe(documentId);
      expect(request.optionalInputs.keySelector?.keyInfo.x509Data).toEqual([
        certificateToDer(pki.signer),
        certificateToDer(pki.intermediate),
      ]);
    });

    it("should reject a signer without key", () => {
      expect(() => createTwoStepSignRequest(xmlDocument(), { certificates: [pki.signer] })).toThrow(
        DsspPreconditionError,
      );
    });

    it("should reject an empty chain", () => {
      expect(() =>
        createTwoStepSignRequest(xmlDocument(), { certificates: [], key: stubKey }),
      ).toThrow(DsspPreconditionError);
    });

    it("should reject a missing signer", () => {
      expect(() => createTwoStepSignRequest(xmlDocument(), undefined)).toThrow(/signer chain is required/);
    });
  });

  describe("resolveSignerChain", () => {
    it("should complete a single end certificate from the trust store", () => {
      const builder = new TrustStoreChainBuilder([pki.root, pki.intermediate]);

      const chain = resolveSignerChain({ certificates: [pki.signer], key: stubKey }, builder);

      expect(chain).toEqual([
        certificateToDer(pki.signer),
        certificateToDer(pki.intermediate),
        certificateToDer(pki.root),
      ]);
    });

    it("should send the end certificate alone without a chain builder", () => {
      const logs: LogEntry[] = [];

      const chain = resolveSignerChain({ certificates: [pki.signer] }, undefined, logs);

      expect(chain).toEqual([certificateToDer(pki.signer)]);
      expect(logs.map((log) => log.level)).toEqual(["warning"]);
    });

    it("should not complete a self-signed certificate", () => {
      const builder = new TrustStoreChainBuilder([pki.intermediate]);

      expect(resolveSignerChain({ certificates: [pki.root] }, builder)).toEqual([
        certificateToDer(pki.root),
      ]);
    });
  });

  describe("createAsyncDownloadRequest", () => {
    it("should cancel the session's token under its response id", () => {
      const session: AsyncSession = {
        kind: "async",
        serverId: "server-42",
        keyId: "urn:uuid:test-key",
        keyValue: new Uint8Array(32),
        keyReference: { reference: { valueType: "test-type", uri: "#test-ref" } },
        expiresOn: new Date("2030-01-01T00:00:00Z"),
      };

      expect(createAsyncDownloadRequest(session)).toEqual({
        optionalInputs: {
          additionalProfile: PROFILES.ASYNCHRONOUS_PROCESSING,
          responseId: "server-42",
          requestSecurityToken: {
            requestType: WS_TRUST.CANCEL,
            cancelTarget: {
              securityTokenReference: {
                reference: {
                  valueType: WS_TRUST.SECURE_CONVERSATION_TOKEN,
                  uri: "urn:uuid:test-key",
                },
              },
            },
          },
        },
      });
    });
  });

  describe("createTwoStepDownloadRequest", () => {
    const session = (): TwoStepSession => ({
      kind: "twoStep",
      signer: pki.signer,
      correlationId: "correlation-1",
      digestAlgorithm: "http://www.w3.org/2001/04/xmlenc#sha256",
      digestValue: new Uint8Array(32),
    });

    it("should require a signed session", () => {
      expect(() => createTwoStepDownloadRequest(session())).toThrow(DsspPreconditionError);
    });

    it("should hand the signature back under the correlation id", () => {
      const request = createTwoStepDownloadRequest({
        ...session(),
        signatureValue: new Uint8Array([9, 8, 7]),
      });

      expect(request.profile).toBe(PROFILES.LOCAL_SIGNATURE);
      expect(request.optionalInputs.servicePolicy).toBe(POLICIES.TWO_STEP);
      expect(request.optionalInputs.correlationId).toBe("correlation-1");
      expect(request.optionalInputs.signatureObject?.base64Signature.value).toEqual(
        new Uint8Array([9, 8, 7]),
      );
      expect(request.inputDocuments).toBeUndefined();
    });
  });

  describe("createVerifyRequest", () => {
    it("should ask for a report with verifier and certificate values", () => {
      const { request, documentId } = createVerifyRequest(xmlDocument());

      expect(request.profile).toBe(PROFILES.DSSP);
      expect(request.optionalInputs.returnVerificationReport).toEqual({
        includeVerifier: true,
        includeCertificateValues: true,
      });
      expect(request.inputDocuments.document[0]?.id).toBe(documentId);
      expect(request.optionalInputs.signaturePlacement).toBeUndefined();
    });
  });
});
