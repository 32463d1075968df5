/**
 * @module protector
 * @description Password-based key protection used by JKS for private-key
 * entries (OID 1.3.6.1.4.1.42.2.17.1.1). Not PKCS#5: the keystream comes from
 * chained SHA-1 over the password and the previous block, and the trailing
 * checksum covers the plaintext rather than the ciphertext.
 *
 * Layout of a protected blob:
 *
 * ```
 * salt (20) ‖ plaintext XOR keystream (n) ‖ SHA1(password ‖ plaintext) (20)
 * ```
 */

import { createHash, randomBytes, timingSafeEqual } from "node:crypto";
import { KeyChecksumMismatchError } from "../errors";
import { passwordBytes } from "./password";

/** Output size of SHA-1, and the size of both salt and checksum. */
export const DIGEST_LENGTH = 20;

/** DER object identifier string of the protection algorithm. */
export const KEY_PROTECTOR_OID = "1.3.6.1.4.1.42.2.17.1.1";

function sha1(...parts: Uint8Array[]): Buffer {
  const h = createHash("sha1");
  parts.forEach((p) => h.update(p));
  return h.digest();
}

/**
 * Keystream of exactly `length` bytes: d₁ = SHA1(pw ‖ salt),
 * dᵢ = SHA1(pw ‖ dᵢ₋₁), concatenated and truncated.
 */
export function deriveKeystream(
  pw: Uint8Array,
  salt: Uint8Array,
  length: number
): Buffer {
  const blocks: Buffer[] = [];
  let produced = 0;
  let seed: Uint8Array = salt;
  while (produced < length) {
    const block = sha1(pw, seed);
    blocks.push(block);
    produced += block.length;
    seed = block;
  }
  return Buffer.concat(blocks).subarray(0, length);
}

function xor(data: Uint8Array, stream: Uint8Array): Buffer {
  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) out[i] = data[i] ^ stream[i];
  return out;
}

/**
 * Encrypt a DER-encoded PrivateKeyInfo under `password`.
 *
 * @param salt - fixed salt for reproducible output; a fresh random salt is
 *   drawn when omitted, which is what every real caller should do
 */
export function protect(
  plaintext: Uint8Array,
  password: string,
  salt: Uint8Array = randomBytes(DIGEST_LENGTH)
): Buffer {
  if (salt.length !== DIGEST_LENGTH) {
    throw new RangeError(`salt must be ${DIGEST_LENGTH} bytes, got ${salt.length}`);
  }
  const pw = passwordBytes(password);
  const body = xor(plaintext, deriveKeystream(pw, salt, plaintext.length));
  const checksum = sha1(pw, plaintext);
  return Buffer.concat([salt, body, checksum]);
}

/** Inverse of {@link protect}; throws KeyChecksumMismatchError on a bad password or corrupted blob. */
export function unprotect(protectedKey: Uint8Array, password: string): Buffer {
  if (protectedKey.length < 2 * DIGEST_LENGTH) {
    throw new KeyChecksumMismatchError(
      `protected key is ${protectedKey.length} bytes, need at least ${2 * DIGEST_LENGTH}`
    );
  }
  const pw = passwordBytes(password);
  const salt = protectedKey.subarray(0, DIGEST_LENGTH);
  const body = protectedKey.subarray(DIGEST_LENGTH, protectedKey.length - DIGEST_LENGTH);
  const checksum = protectedKey.subarray(protectedKey.length - DIGEST_LENGTH);

  const plaintext = xor(body, deriveKeystream(pw, salt, body.length));
  if (!timingSafeEqual(sha1(pw, plaintext), checksum)) {
    throw new KeyChecksumMismatchError();
  }
  return plaintext;
}
