import type { ByteWriter } from "../codec/writer";
import type { CertEntry } from "../types";
import { ENTRY_TAG, writeCertificate, writeEntryHeader } from "./common";

/**
 * Trusted certificate record:
 * tag 2 ‖ alias ‖ timestamp ‖ "X.509" ‖ uint32 len ‖ DER
 */
export function writeCertEntry(w: ByteWriter, entry: CertEntry): void {
  writeEntryHeader(w, ENTRY_TAG.trustedCert, entry.alias, entry.timestamp);
  writeCertificate(w, entry.cert, entry.alias);
}
