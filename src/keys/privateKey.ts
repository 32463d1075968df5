/**
 * @module privateKey
 * @description Private keys a keypair entry may carry, and their PKCS#8
 * PrivateKeyInfo encoding.
 *
 * The set of algorithms is closed. Only RSA can currently be written; the
 * other variants are accepted by the types so that callers get a typed
 * UnsupportedKeyAlgorithmError instead of a crash. Supporting another
 * algorithm means giving it an OID in KEY_ALGORITHM_OIDS and a case in
 * encodePrivateKeyInfo().
 */

import { createPrivateKey, type KeyObject, type KeyType } from "node:crypto";
import * as forge from "node-forge";
import { algorithmIdentifier, integer, octetString, sequence, toDer } from "../codec/der";
import { StructureMarshalError, UnsupportedKeyAlgorithmError } from "../errors";

export type KeyAlgorithm = KeyType;

export interface RsaPrivateKey {
  algorithm: "rsa";
  key: forge.pki.rsa.PrivateKey;
}

/** Key of an algorithm the encoder does not handle yet. */
export interface UnsupportedPrivateKey {
  algorithm: Exclude<KeyAlgorithm, "rsa">;
  key: KeyObject;
}

export type PrivateKey = RsaPrivateKey | UnsupportedPrivateKey;

/** Standard algorithm OIDs used in PrivateKeyInfo (RFC 3279 § 2.3). */
export const KEY_ALGORITHM_OIDS: Partial<Record<KeyAlgorithm, string>> = {
  rsa: "1.2.840.113549.1.1.1",
};

function rsaPrivateKeyInfo(key: forge.pki.rsa.PrivateKey, oid: string): Buffer {
  const pkcs1 = toDer(forge.pki.privateKeyToAsn1(key));
  return toDer(sequence([integer(0), algorithmIdentifier(oid), octetString(pkcs1)]));
}

/**
 * DER PrivateKeyInfo for `key`. `alias` only feeds error messages.
 */
export function encodePrivateKeyInfo(key: PrivateKey, alias: string): Buffer {
  const oid = KEY_ALGORITHM_OIDS[key.algorithm];
  switch (key.algorithm) {
    case "rsa":
      if (!oid) throw new UnsupportedKeyAlgorithmError(key.algorithm, alias);
      try {
        return rsaPrivateKeyInfo(key.key, oid);
      } catch (err) {
        throw new StructureMarshalError("private key info", alias, err);
      }
    default:
      throw new UnsupportedKeyAlgorithmError(key.algorithm, alias);
  }
}

export function privateKeyFromKeyObject(keyObject: KeyObject): PrivateKey {
  if (keyObject.type !== "private") {
    throw new TypeError(`expected a private key, got a ${keyObject.type} key`);
  }
  const algorithm = keyObject.asymmetricKeyType;
  if (!algorithm) {
    throw new TypeError("key object has no asymmetric key type");
  }
  if (algorithm === "rsa") {
    const pem = keyObject.export({ type: "pkcs1", format: "pem" }).toString();
    return { algorithm, key: forge.pki.privateKeyFromPem(pem) };
  }
  return { algorithm, key: keyObject };
}

/** Parse a PKCS#1 or PKCS#8 PEM private key, decrypting it with `passphrase` if given. */
export function privateKeyFromPem(pem: string, passphrase?: string): PrivateKey {
  return privateKeyFromKeyObject(
    createPrivateKey(passphrase === undefined ? pem : { key: pem, passphrase })
  );
}
