import type { ZodIssue } from "zod";

export type KeystoreErrorCode =
  | "ENCODING_TOO_LONG"
  | "UNSUPPORTED_KEY_ALGORITHM"
  | "STRUCTURE_MARSHAL_FAILURE"
  | "ENCRYPTION_FAILURE"
  | "KEY_CHECKSUM_MISMATCH"
  | "INVALID_OPTIONS";

/** Base class for every error raised while encoding a keystore. */
export abstract class KeystoreError extends Error {
  abstract readonly code: KeystoreErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Text fields that go through the length-prefixed string writer. */
export type TextField = "alias" | "certificate type";

export class EncodingTooLongError extends KeystoreError {
  readonly code = "ENCODING_TOO_LONG";

  constructor(
    readonly field: TextField,
    readonly byteLength: number,
    readonly alias?: string
  ) {
    super(
      `failed to write ${field}: ${byteLength} UTF-8 bytes exceeds 65535` +
        (alias === undefined ? "" : ` (alias ${JSON.stringify(truncate(alias))})`)
    );
  }
}

export class UnsupportedKeyAlgorithmError extends KeystoreError {
  readonly code = "UNSUPPORTED_KEY_ALGORITHM";

  constructor(
    readonly algorithm: string,
    readonly alias?: string
  ) {
    super(
      `unsupported private key algorithm "${algorithm}"` +
        (alias === undefined ? "" : ` for alias ${JSON.stringify(alias)}`) +
        "; only RSA keys can be written"
    );
  }
}

export class StructureMarshalError extends KeystoreError {
  readonly code = "STRUCTURE_MARSHAL_FAILURE";

  constructor(
    readonly structure: string,
    readonly alias: string,
    cause: unknown
  ) {
    super(
      `failed to marshal ${structure} for alias ${JSON.stringify(alias)}: ${describe(cause)}`,
      { cause }
    );
  }
}

export class EncryptionError extends KeystoreError {
  readonly code = "ENCRYPTION_FAILURE";

  constructor(readonly alias: string, cause: unknown) {
    super(
      `failed to protect private key for alias ${JSON.stringify(alias)}: ${describe(cause)}`,
      { cause }
    );
  }
}

export class KeyChecksumMismatchError extends KeystoreError {
  readonly code = "KEY_CHECKSUM_MISMATCH";

  constructor(reason = "checksum mismatch") {
    super(`cannot recover protected key: ${reason} (wrong password or corrupted data)`);
  }
}

export class InvalidOptionsError extends KeystoreError {
  readonly code = "INVALID_OPTIONS";

  constructor(readonly issues: ZodIssue[]) {
    super(
      `invalid pack options: ${issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`
    );
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function truncate(s: string, max = 64): string {
  return s.length > max ? `${s.slice(0, max)}…` : s;
}
