import type { ByteWriter } from "../codec/writer";

/** Record type tags at the start of every entry. */
export const ENTRY_TAG = {
  privateKey: 1,
  trustedCert: 2,
} as const;

/** Certificate type label written before each certificate. */
export const CERT_TYPE = "X.509";

/**
 * Unset and epoch-zero timestamps are taken as "now", read from the wall
 * clock at write time. Repeated packs only match byte-for-byte when the
 * caller sets timestamps.
 */
export function resolveTimestamp(ts: Date | undefined): Date {
  return !ts || ts.getTime() === 0 ? new Date() : ts;
}

/** Type tag, alias and timestamp, shared by both record kinds. */
export function writeEntryHeader(
  w: ByteWriter,
  tag: (typeof ENTRY_TAG)[keyof typeof ENTRY_TAG],
  alias: string,
  timestamp: Date | undefined
): void {
  w.writeUint32(tag);
  w.writeString(alias, { field: "alias", alias });
  w.writeTimestamp(resolveTimestamp(timestamp));
}

/** "X.509" label followed by the uint32-length-prefixed DER bytes. */
export function writeCertificate(w: ByteWriter, der: Uint8Array, alias: string): void {
  w.writeString(CERT_TYPE, { field: "certificate type", alias });
  w.writeLengthPrefixed(der);
}
