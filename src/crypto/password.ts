/**
 * Password bytes as the keystore format hashes them: each UTF-16 code unit
 * written high byte first, no byte-order mark.
 */
export function passwordBytes(password: string): Buffer {
  return Buffer.from(password, "utf16le").swap16();
}
