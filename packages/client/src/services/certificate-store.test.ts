import { beforeAll, describe, expect, it } from "vitest";

import { createMockPki } from "../test/mock-pki";

import { MemoryCertificateStore } from "./certificate-store";
import { certificateThumbprint } from "./crypto-utils";

import type { MockPki } from "../test/mock-pki";

describe("MemoryCertificateStore", () => {
  let pki: MockPki;
  let store: MemoryCertificateStore;

  beforeAll(async () => {
    pki = await createMockPki();
    store = new MemoryCertificateStore()
      .add("CurrentUser", "My", [pki.signer])
      .add("LocalMachine", "Root", [pki.root, pki.intermediate]);
  });

  it("should find by thumbprint written with colons and lower case", () => {
    const thumbprint = certificateThumbprint(pki.intermediate)
      .toLowerCase()
      .match(/.{2}/g)
      ?.join(":");

    const found = store.find({
      storeLocation: "LocalMachine",
      storeName: "Root",
      findType: "thumbprint",
      findValue: thumbprint ?? "",
    });

    expect(found).toBe(pki.intermediate);
  });

  it("should find by serial number", () => {
    expect(
      store.find({
        storeLocation: "CurrentUser",
        storeName: "my",
        findType: "serialNumber",
        findValue: "01 23 45",
      }),
    ).toBe(pki.signer);
  });

  it("should find by part of the subject", () => {
    expect(
      store.find({
        storeLocation: "LocalMachine",
        storeName: "Root",
        findType: "subjectName",
        findValue: "test root",
      }),
    ).toBe(pki.root);
  });

  it("should only search the named store", () => {
    expect(
      store.find({
        storeLocation: "LocalMachine",
        storeName: "My",
        findType: "subjectName",
        findValue: "Alice",
      }),
    ).toBeUndefined();
  });
});
