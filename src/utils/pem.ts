import * as forge from "node-forge";

/**
 * DER bytes of every CERTIFICATE block in a PEM bundle, in file order.
 * Other block types are skipped.
 */
export function certificatesFromPem(pem: string): Buffer[] {
  return forge.pem
    .decode(pem)
    .filter((block) => block.type === "CERTIFICATE")
    .map((block) => Buffer.from(block.body, "binary"));
}

/** DER bytes of the single certificate in `pem`. */
export function certificateFromPem(pem: string): Buffer {
  const certs = certificatesFromPem(pem);
  if (certs.length !== 1) {
    throw new Error(`expected exactly one CERTIFICATE block, found ${certs.length}`);
  }
  return certs[0];
}
