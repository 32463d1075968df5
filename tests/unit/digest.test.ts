import { createHash } from "node:crypto";
import { describe, expect, it } from "vitest";
import { computeDigest, DIGEST_WHITENER, verifyDigest } from "../../src/crypto/digest";

const data = Buffer.from("feedfeed0000000200000000", "hex");

describe("digest.ts", () => {
  it("should hash password, whitener and data in that order", () => {
    const expected = createHash("sha1")
      .update(Buffer.from("0063006100620063", "hex")) // "cabc" UTF-16BE
      .update(Buffer.from("Mighty Aphrodite"))
      .update(data)
      .digest();

    const d = computeDigest(data, "cabc");
    expect(d.length).toBe(20);
    expect(d).toEqual(expected);
    expect(DIGEST_WHITENER).toBe("Mighty Aphrodite");
  });

  it("should depend on the password", () => {
    expect(computeDigest(data, "a")).not.toEqual(computeDigest(data, "b"));
  });

  describe("verifyDigest", () => {
    const file = Buffer.concat([data, computeDigest(data, "changeit")]);

    it("should accept a file with a matching trailer", () => {
      expect(verifyDigest(file, "changeit")).toBe(true);
    });

    it("should reject a wrong password", () => {
      expect(verifyDigest(file, "wrong")).toBe(false);
    });

    it("should reject a corrupted body", () => {
      const copy = Buffer.from(file);
      copy[5] ^= 0xff;
      expect(verifyDigest(copy, "changeit")).toBe(false);
    });

    it("should reject input shorter than a digest", () => {
      expect(verifyDigest(Buffer.alloc(19), "changeit")).toBe(false);
    });
  });
});
