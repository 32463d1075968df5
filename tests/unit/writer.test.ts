import { describe, expect, it } from "vitest";
import { ByteWriter, MAX_STRING_BYTES } from "../../src/codec/writer";
import { EncodingTooLongError } from "../../src/errors";

function hex(w: ByteWriter): string {
  return w.toBuffer().toString("hex");
}

describe("writer.ts", () => {
  describe("integers", () => {
    it("should write uint32 big-endian", () => {
      const w = new ByteWriter();
      w.writeUint32(0xfeedfeed);
      w.writeUint32(2);
      expect(hex(w)).toBe("feedfeed00000002");
    });

    it("should write uint64 big-endian from bigint and number", () => {
      const w = new ByteWriter();
      w.writeUint64(2n ** 40n + 1n);
      w.writeUint64(258);
      expect(hex(w)).toBe("0000010000000001" + "0000000000000102");
    });
  });

  describe("writeTimestamp", () => {
    it("should write milliseconds since the epoch", () => {
      const w = new ByteWriter();
      w.writeTimestamp(new Date(1700000000123));
      expect(hex(w)).toBe("0000018bcfe5687b");
    });

    it("should write pre-epoch dates as two's complement", () => {
      const w = new ByteWriter();
      w.writeTimestamp(new Date(-1));
      expect(hex(w)).toBe("ffffffffffffffff");
    });

    it("should reject an invalid Date", () => {
      const w = new ByteWriter();
      expect(() => w.writeTimestamp(new Date(Number.NaN))).toThrow(RangeError);
      expect(w.length).toBe(0);
    });
  });

  describe("writeString", () => {
    it("should prefix the UTF-8 byte length", () => {
      const w = new ByteWriter();
      w.writeString("ca", { field: "alias" });
      w.writeString("é", { field: "alias" });
      expect(hex(w)).toBe("00026361" + "0002c3a9");
    });

    it("should write an empty string as a zero length", () => {
      const w = new ByteWriter();
      w.writeString("", { field: "alias" });
      expect(hex(w)).toBe("0000");
    });

    it("should accept exactly 65535 bytes", () => {
      const w = new ByteWriter();
      w.writeString("a".repeat(MAX_STRING_BYTES), { field: "alias" });
      const out = w.toBuffer();
      expect(out.length).toBe(2 + 65535);
      expect(out.readUInt16BE(0)).toBe(0xffff);
    });

    it("should reject 65536 bytes with EncodingTooLongError", () => {
      const w = new ByteWriter();
      const alias = "a".repeat(MAX_STRING_BYTES + 1);
      try {
        w.writeString(alias, { field: "alias", alias });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(EncodingTooLongError);
        if (!(err instanceof EncodingTooLongError)) return;
        expect(err.code).toBe("ENCODING_TOO_LONG");
        expect(err.field).toBe("alias");
        expect(err.byteLength).toBe(65536);
        expect(err.alias).toBe(alias);
      }
      expect(w.length).toBe(0);
    });

    it("should count bytes, not characters", () => {
      const w = new ByteWriter();
      // "€" is three bytes in UTF-8
      w.writeString("€".repeat(21845), { field: "alias" });
      expect(w.length).toBe(2 + 65535);
      expect(() =>
        w.writeString("€".repeat(21846), { field: "alias" })
      ).toThrow(EncodingTooLongError);
    });
  });

  describe("buffering", () => {
    it("should track length and concatenate in order", () => {
      const w = new ByteWriter();
      w.writeBytes(Uint8Array.of(1, 2));
      w.writeLengthPrefixed(Uint8Array.of(9, 8, 7));
      expect(w.length).toBe(9);
      expect(hex(w)).toBe("0102" + "00000003" + "090807");
    });

    it("should copy input bytes", () => {
      const w = new ByteWriter();
      const src = Uint8Array.of(1, 2, 3);
      w.writeBytes(src);
      src[0] = 0xff;
      expect(hex(w)).toBe("010203");
    });
  });
});
