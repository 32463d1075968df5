/* ------------------------------------------------------------------
 * der.ts  •  Thin helpers over node-forge's ASN.1 builder
 * ------------------------------------------------------------------ */

import * as forge from "node-forge";

const { asn1 } = forge;

export type Asn1 = forge.asn1.Asn1;

export function sequence(children: Asn1[]): Asn1 {
  return asn1.create(asn1.Class.UNIVERSAL, asn1.Type.SEQUENCE, true, children);
}

export function integer(n: number): Asn1 {
  return asn1.create(
    asn1.Class.UNIVERSAL,
    asn1.Type.INTEGER,
    false,
    asn1.integerToDer(n).getBytes()
  );
}

export function octetString(bytes: Uint8Array): Asn1 {
  return asn1.create(
    asn1.Class.UNIVERSAL,
    asn1.Type.OCTETSTRING,
    false,
    Buffer.from(bytes).toString("binary")
  );
}

/** AlgorithmIdentifier with an explicit NULL parameter. */
export function algorithmIdentifier(oid: string): Asn1 {
  return sequence([
    asn1.create(
      asn1.Class.UNIVERSAL,
      asn1.Type.OID,
      false,
      asn1.oidToDer(oid).getBytes()
    ),
    asn1.create(asn1.Class.UNIVERSAL, asn1.Type.NULL, false, ""),
  ]);
}

export function toDer(obj: Asn1): Buffer {
  return Buffer.from(asn1.toDer(obj).getBytes(), "binary");
}

export function fromDer(bytes: Uint8Array): Asn1 {
  return asn1.fromDer(Buffer.from(bytes).toString("binary"));
}
