/**
 * WS-Trust computed key (P_SHA1, RFC 2246 §5 / WS-Trust 1.3 §4.4.4).
 *
 *   A(0) = seed, A(i) = HMAC(secret, A(i-1))
 *   P_SHA1(secret, seed) = HMAC(secret, A(1) + seed) + HMAC(secret, A(2) + seed) + ...
 *
 * The requestor entropy (client nonce) is the secret, the issuer entropy the seed.
 */
import { createHmac } from "node:crypto";

import { DsspPreconditionError } from "../errors";

function hmacSha1(key: Uint8Array, data: Uint8Array): Buffer {
  return createHmac("sha1", key).update(data).digest();
}

/**
 * Derive the session key shared with the service
 * @param keySizeBits requested key length; must be a positive multiple of 8
 */
export function deriveKey(
  clientNonce: Uint8Array,
  serverEntropy: Uint8Array,
  keySizeBits: number,
): Buffer {
  if (!Number.isInteger(keySizeBits) || keySizeBits <= 0 || keySizeBits % 8 !== 0) {
    throw new DsspPreconditionError(
      `Derived key size must be a positive multiple of 8 bits, got ${String(keySizeBits)}`,
      "keySizeBits",
    );
  }

  const length = keySizeBits / 8;
  const seed = Buffer.from(serverEntropy);
  const blocks: Buffer[] = [];
  let produced = 0;
  let a: Buffer = seed;

  while (produced < length) {
    a = hmacSha1(clientNonce, a);
    const block = hmacSha1(clientNonce, Buffer.concat([a, seed]));
    blocks.push(block);
    produced += block.length;
  }

  return Buffer.concat(blocks).subarray(0, length);
}
