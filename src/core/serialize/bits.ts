// src/core/serialize/bits.ts
// MSB-first bit streams

import { InvalidArgumentError } from "../errors";

export class BitWriter {
  private readonly bytes: number[] = [];
  private current = 0;
  private used = 0;

  writeBit(bit: boolean): void {
    this.current = (this.current << 1) | (bit ? 1 : 0);
    this.used += 1;
    if (this.used === 8) {
      this.bytes.push(this.current);
      this.current = 0;
      this.used = 0;
    }
  }

  /** Write the low `width` bits of a non-negative integer, high bit first */
  writeUnsigned(value: number, width: number): void {
    for (let i = width - 1; i >= 0; i--) {
      this.writeBit(Math.floor(value / 2 ** i) % 2 === 1);
    }
  }

  writeBytes(bytes: Uint8Array): void {
    for (const byte of bytes) this.writeUnsigned(byte, 8);
  }

  /** Pad the final byte with zero bits and return the buffer */
  finish(): Uint8Array {
    const out = [...this.bytes];
    if (this.used > 0) out.push(this.current << (8 - this.used));
    return Uint8Array.from(out);
  }
}

export class BitReader {
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {}

  readBit(): boolean {
    const index = this.offset >> 3;
    if (index >= this.bytes.length) throw new InvalidArgumentError("serialize: not enough data");
    const bit = (this.bytes[index] >> (7 - (this.offset & 7))) & 1;
    this.offset += 1;
    return bit === 1;
  }

  readUnsigned(width: number): number {
    let value = 0;
    for (let i = 0; i < width; i++) value = value * 2 + (this.readBit() ? 1 : 0);
    return value;
  }

  readBytes(count: number): Uint8Array {
    const out = new Uint8Array(count);
    for (let i = 0; i < count; i++) out[i] = this.readUnsigned(8);
    return out;
  }
}
