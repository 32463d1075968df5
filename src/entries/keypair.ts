import type { ByteWriter } from "../codec/writer";
import { sequence, algorithmIdentifier, octetString, toDer } from "../codec/der";
import { KEY_PROTECTOR_OID, protect } from "../crypto/protector";
import { EncryptionError, StructureMarshalError } from "../errors";
import { encodePrivateKeyInfo } from "../keys/privateKey";
import type { PackOptions } from "../schema/options";
import type { KeypairEntry } from "../types";
import { ENTRY_TAG, writeCertificate, writeEntryHeader } from "./common";

/** Per-alias override if one exists, otherwise the store password. */
export function resolveKeyPassword(alias: string, opts: PackOptions): string {
  const overrides = opts.keyPasswords;
  if (overrides && Object.prototype.hasOwnProperty.call(overrides, alias)) {
    return overrides[alias];
  }
  return opts.password;
}

function protectKeyInfo(entry: KeypairEntry, password: string): Buffer {
  const plain = encodePrivateKeyInfo(entry.privateKey, entry.alias);
  try {
    return protect(plain, password);
  } catch (err) {
    throw new EncryptionError(entry.alias, err);
  } finally {
    plain.fill(0);
  }
}

/**
 * DER EncryptedPrivateKeyInfo holding the protected PrivateKeyInfo of
 * `entry`, under the key protector's algorithm identifier.
 */
export function encryptPrivateKey(entry: KeypairEntry, password: string): Buffer {
  const ciphertext = protectKeyInfo(entry, password);
  try {
    return toDer(sequence([algorithmIdentifier(KEY_PROTECTOR_OID), octetString(ciphertext)]));
  } catch (err) {
    throw new StructureMarshalError("encrypted private key info", entry.alias, err);
  }
}

/**
 * Private key record:
 * tag 1 ‖ alias ‖ timestamp ‖ uint32 len ‖ EncryptedPrivateKeyInfo ‖
 * uint32 chain length ‖ ("X.509" ‖ uint32 len ‖ DER)*
 */
export function writeKeypairEntry(
  w: ByteWriter,
  entry: KeypairEntry,
  opts: PackOptions
): void {
  writeEntryHeader(w, ENTRY_TAG.privateKey, entry.alias, entry.timestamp);

  const encrypted = encryptPrivateKey(entry, resolveKeyPassword(entry.alias, opts));
  w.writeLengthPrefixed(encrypted);

  w.writeUint32(entry.certChain.length);
  for (const cert of entry.certChain) {
    writeCertificate(w, cert, entry.alias);
  }
}
