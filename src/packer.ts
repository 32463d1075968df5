/**
 * @module packer
 * @description Serialises a {@link Keystore} to JKS bytes.
 *
 * File layout (all integers big-endian):
 *
 * ```
 * 0xFEEDFEED ‖ version 2 ‖ entry count
 * trusted certificate records, in keystore order
 * private key records, in keystore order
 * SHA-1 digest over everything above (20 bytes)
 * ```
 *
 * Certificates always precede keys regardless of how the caller built the
 * keystore; readers in the wild expect that order.
 *
 * @example
 * ```typescript
 * import { pack, certificateFromPem } from "keystore-pack";
 *
 * const jks = pack(
 *   { certs: [{ alias: "ca", cert: certificateFromPem(caPem) }], keypairs: [] },
 *   { password: "changeit" }
 * );
 * fs.writeFileSync("truststore.jks", jks);
 * ```
 */

import { performance } from "node:perf_hooks";
import { ByteWriter } from "./codec/writer";
import { computeDigest } from "./crypto/digest";
import { writeCertEntry } from "./entries/cert";
import { writeKeypairEntry } from "./entries/keypair";
import { InvalidOptionsError, KeystoreError } from "./errors";
import { packFailures, packHist, packedEntries } from "./metrics";
import { PackOptionsSchema, type PackOptions } from "./schema/options";
import type { Keystore } from "./types";
import { log } from "./utils/logger";

export const MAGIC_NUMBER = 0xfeedfeed;
export const FORMAT_VERSION = 2;

/** Stages of a pack call; each runs once, in this order. Any error ends the call. */
export type PackState =
  | "start"
  | "header"
  | "certs"
  | "keypairs"
  | "digest"
  | "done";

/**
 * Returns the caller's own object: zod's record parsing drops a
 * `"__proto__"` key, and an alias of that name must keep its override.
 */
function validateOptions(options: PackOptions): PackOptions {
  const parsed = PackOptionsSchema.safeParse(options);
  if (!parsed.success) throw new InvalidOptionsError(parsed.error.issues);
  return options;
}

/**
 * Encode `keystore` as a complete JKS file.
 *
 * Either the whole file is returned or an error is thrown; nothing partial
 * ever escapes. Each private key gets a fresh random salt, so two packs of the
 * same keystore differ in their key records and digest.
 *
 * @throws {@link InvalidOptionsError} options fail validation
 * @throws {@link EncodingTooLongError} an alias exceeds 65535 UTF-8 bytes
 * @throws {@link UnsupportedKeyAlgorithmError} a keypair holds a non-RSA key
 * @throws {@link StructureMarshalError} DER encoding of a key failed
 * @throws {@link EncryptionError} key protection failed
 */
export function pack(keystore: Keystore, options: PackOptions): Buffer {
  const t0 = performance.now();
  let state: PackState = "start";
  let alias: string | undefined;

  try {
    const opts = validateOptions(options);
    const w = new ByteWriter();

    state = "header";
    w.writeUint32(MAGIC_NUMBER);
    w.writeUint32(FORMAT_VERSION);
    w.writeUint32(keystore.certs.length + keystore.keypairs.length);

    state = "certs";
    for (const cert of keystore.certs) {
      alias = cert.alias;
      writeCertEntry(w, cert);
      log.debug("wrote trusted certificate", { alias });
    }

    state = "keypairs";
    for (const kp of keystore.keypairs) {
      alias = kp.alias;
      writeKeypairEntry(w, kp, opts);
      log.debug("wrote private key", { alias, chain: kp.certChain.length });
    }
    alias = undefined;

    state = "digest";
    const body = w.toBuffer();
    const out = Buffer.concat([body, computeDigest(body, opts.password)]);

    state = "done";
    packedEntries.inc({ kind: "trustedCert" }, keystore.certs.length);
    packedEntries.inc({ kind: "privateKey" }, keystore.keypairs.length);
    log.verbose("packed keystore", {
      certs: keystore.certs.length,
      keypairs: keystore.keypairs.length,
      bytes: out.length,
    });
    return out;
  } catch (err) {
    packFailures.inc({
      code: err instanceof KeystoreError ? err.code : "UNKNOWN",
    });
    log.error(`pack failed while writing ${state}`, {
      ...(alias !== undefined && { alias }),
      error: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    packHist.observe(performance.now() - t0);
  }
}
