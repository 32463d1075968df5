/* ------------------------------------------------------------------
 * writer.ts  •  Big-endian primitive writer for the JKS container
 * ------------------------------------------------------------------
 *  ▸ writeUint32 / writeUint64   – fixed-width big-endian integers
 *  ▸ writeTimestamp(date)        – ms since epoch as 64-bit integer
 *  ▸ writeString(value, ctx)     – uint16 byte length + UTF-8 bytes
 *  ▸ writeLengthPrefixed(bytes)  – uint32 byte length + raw bytes
 * ------------------------------------------------------------------ */

import { EncodingTooLongError, type TextField } from "../errors";

export const MAX_STRING_BYTES = 0xffff;

export interface StringContext {
  field: TextField;
  /** Entry alias, carried into the error when the field is too long */
  alias?: string;
}

/** Append-only byte sink. Chunks are only concatenated in toBuffer(). */
export class ByteWriter {
  private readonly chunks: Buffer[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  writeBytes(bytes: Uint8Array): void {
    const chunk = Buffer.from(bytes);
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  writeUint16(n: number): void {
    const raw = Buffer.alloc(2);
    raw.writeUInt16BE(n);
    this.writeBytes(raw);
  }

  writeUint32(n: number): void {
    const raw = Buffer.alloc(4);
    raw.writeUInt32BE(n);
    this.writeBytes(raw);
  }

  writeUint64(n: bigint | number): void {
    const raw = Buffer.alloc(8);
    // two's complement for negatives, matching a signed → unsigned cast
    raw.writeBigUInt64BE(BigInt.asUintN(64, BigInt(n)));
    this.writeBytes(raw);
  }

  /** Sub-millisecond precision is already gone in a JS Date. */
  writeTimestamp(ts: Date): void {
    const ms = ts.getTime();
    if (!Number.isFinite(ms)) throw new RangeError("timestamp is an invalid Date");
    this.writeUint64(Math.trunc(ms));
  }

  writeString(value: string, ctx: StringContext): void {
    const bytes = Buffer.from(value, "utf8");
    if (bytes.length > MAX_STRING_BYTES) {
      throw new EncodingTooLongError(ctx.field, bytes.length, ctx.alias);
    }
    this.writeUint16(bytes.length);
    this.writeBytes(bytes);
  }

  writeLengthPrefixed(bytes: Uint8Array): void {
    this.writeUint32(bytes.length);
    this.writeBytes(bytes);
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks, this.size);
  }
}
