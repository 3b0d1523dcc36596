import { describe, expect, it } from "vitest";

import { DsspPreconditionError } from "../errors";

import { deriveKey } from "./derived-key";

describe("deriveKey", () => {
  const secret = new Uint8Array(32).fill(0x01);
  const seed = new Uint8Array(32).fill(0x02);

  it("should produce the P_SHA1 output for a 256-bit key", () => {
    const key = deriveKey(secret, seed, 256);

    expect(key.toString("hex")).toBe(
      "e7dee695899af2c5b5603c57cc0bbfb1cef01b0c5b4c1f113a95b064cebd65ed",
    );
  });

  it("should truncate to the requested size", () => {
    expect(deriveKey(secret, seed, 128).toString("hex")).toBe("e7dee695899af2c5b5603c57cc0bbfb1");
  });

  it("should be a prefix of the longer key for the same inputs", () => {
    const nonce = Buffer.from("test-client-nonce");
    const entropy = Buffer.from("test-server-entropy");

    const key192 = deriveKey(nonce, entropy, 192);
    const key256 = deriveKey(nonce, entropy, 256);

    expect(key256.toString("hex")).toBe(
      "65677c492309660d7d10a5a3877d6a5ea6680d8f83d50c432e865152a5051764",
    );
    expect(key192.toString("hex")).toBe("65677c492309660d7d10a5a3877d6a5ea6680d8f83d50c43");
    expect(key256.subarray(0, 24).equals(key192)).toBe(true);
  });

  it("should be deterministic", () => {
    expect(deriveKey(secret, seed, 256).equals(deriveKey(secret, seed, 256))).toBe(true);
  });

  it("should depend on which side provides the secret", () => {
    expect(deriveKey(seed, secret, 256).equals(deriveKey(secret, seed, 256))).toBe(false);
  });

  it.each([0, -8, 12, 7.5, Number.NaN])("should reject a key size of %s bits", (bits) => {
    expect(() => deriveKey(secret, seed, bits)).toThrow(DsspPreconditionError);
  });
});
