import { createHash, timingSafeEqual } from "node:crypto";
import { passwordBytes } from "./password";
import { DIGEST_LENGTH } from "./protector";

/** Fixed string mixed into the whole-file digest between password and data. */
export const DIGEST_WHITENER = "Mighty Aphrodite";

/** SHA1(UTF-16BE(password) ‖ "Mighty Aphrodite" ‖ data) */
export function computeDigest(data: Uint8Array, password: string): Buffer {
  return createHash("sha1")
    .update(passwordBytes(password))
    .update(Buffer.from(DIGEST_WHITENER, "utf8"))
    .update(data)
    .digest();
}

/**
 * Check the 20-byte trailer of a packed keystore against its contents.
 * Returns false for a wrong password, a corrupted file or a file too short to
 * carry a trailer.
 */
export function verifyDigest(file: Uint8Array, password: string): boolean {
  if (file.length < DIGEST_LENGTH) return false;
  const body = file.subarray(0, file.length - DIGEST_LENGTH);
  const trailer = file.subarray(file.length - DIGEST_LENGTH);
  return timingSafeEqual(computeDigest(body, password), trailer);
}
