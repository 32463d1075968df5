export { pack, MAGIC_NUMBER, FORMAT_VERSION } from "./packer";
export { protect, unprotect, KEY_PROTECTOR_OID } from "./crypto/protector";
export { computeDigest, verifyDigest } from "./crypto/digest";
export {
  privateKeyFromKeyObject,
  privateKeyFromPem,
  KEY_ALGORITHM_OIDS,
} from "./keys/privateKey";
export { certificateFromPem, certificatesFromPem } from "./utils/pem";
export { configure } from "./config";
export { log } from "./utils/logger";
export { registry } from "./metrics";
export {
  KeystoreError,
  EncodingTooLongError,
  UnsupportedKeyAlgorithmError,
  StructureMarshalError,
  EncryptionError,
  KeyChecksumMismatchError,
  InvalidOptionsError,
} from "./errors";

export type { Keystore, CertEntry, KeypairEntry, PrivateKey, PackOptions } from "./types";
export type { KeyAlgorithm, RsaPrivateKey, UnsupportedPrivateKey } from "./keys/privateKey";
export type { KeystoreErrorCode, TextField } from "./errors";
export type { KeystorePackConfig, LogLevel } from "./config";
export type { PackState } from "./packer";
