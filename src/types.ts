/* ------------------------------------------------------------------
 * types.ts  •  In-memory keystore model handed to pack()
 * ------------------------------------------------------------------ */

import type { PrivateKey } from "./keys/privateKey";

export type { PrivateKey } from "./keys/privateKey";
export type { PackOptions } from "./schema/options";

/** Trusted certificate entry */
export interface CertEntry {
  alias: string;

  /** Creation date; unset or epoch-zero means "now" at pack time */
  timestamp?: Date;

  /** DER-encoded X.509 certificate, written as-is */
  cert: Uint8Array;
}

/** Private key with its certificate chain */
export interface KeypairEntry {
  alias: string;
  timestamp?: Date;
  privateKey: PrivateKey;

  /** DER certificates, leaf first */
  certChain: Uint8Array[];
}

/**
 * Keystore contents. Alias uniqueness is not checked; entries are written
 * exactly as given.
 */
export interface Keystore {
  certs: CertEntry[];
  keypairs: KeypairEntry[];
}
