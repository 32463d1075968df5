import { generateKeyPairSync, type KeyObject } from "node:crypto";
import { privateKeyFromKeyObject, type PrivateKey } from "../../src/keys/privateKey";

/** 2023-11-14T22:13:20.000Z */
export const T = new Date(1700000000000);

/** Stand-in DER certificate; pack never parses certificate bytes. */
export function fakeCert(tag: number): Buffer {
  return Buffer.from([0x30, 0x03, 0x02, 0x01, tag]);
}

export function rsaKey(): { keyObject: KeyObject; privateKey: PrivateKey } {
  const { privateKey: keyObject } = generateKeyPairSync("rsa", {
    modulusLength: 1024,
  });
  return { keyObject, privateKey: privateKeyFromKeyObject(keyObject) };
}

export function ecKey(): PrivateKey {
  const { privateKey } = generateKeyPairSync("ec", { namedCurve: "prime256v1" });
  return privateKeyFromKeyObject(privateKey);
}

/** Sequential reader over a packed keystore, used to check layouts. */
export class Reader {
  private off = 0;

  constructor(private readonly buf: Buffer) {}

  get offset(): number {
    return this.off;
  }

  uint16(): number {
    const v = this.buf.readUInt16BE(this.off);
    this.off += 2;
    return v;
  }

  uint32(): number {
    const v = this.buf.readUInt32BE(this.off);
    this.off += 4;
    return v;
  }

  uint64(): bigint {
    const v = this.buf.readBigUInt64BE(this.off);
    this.off += 8;
    return v;
  }

  bytes(n: number): Buffer {
    const v = this.buf.subarray(this.off, this.off + n);
    this.off += n;
    return v;
  }

  string(): string {
    return this.bytes(this.uint16()).toString("utf8");
  }

  lengthPrefixed(): Buffer {
    return this.bytes(this.uint32());
  }
}
