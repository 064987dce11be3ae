/**
 * @quarry/core — binary primitive encoder
 *
 * Canonical encodings, bit-exact across implementations:
 *
 *   null     0 bytes
 *   boolean  1 byte, 0x00 / 0x01
 *   int32    zig-zag, then varint (7 bits per byte, low group first,
 *   int64    high bit set on every byte but the last)
 *   float32  4 bytes IEEE-754, little-endian
 *   float64  8 bytes IEEE-754, little-endian
 *   bytes    int64 length, then the raw bytes
 *   string   UTF-8, framed as bytes
 *
 * Zig-zag maps signed onto unsigned so small magnitudes stay short:
 *   0 → 0, -1 → 1, 1 → 2, -2 → 3, …
 */

import { INT32_MAX, INT32_MIN } from './constants';

// TextEncoder.encode() is stateless; one instance serves every encoder.
const utf8Encoder = new TextEncoder();

export class BinaryEncoder {
  private buf:  Uint8Array;
  private view: DataView;
  private pos = 0;

  constructor(initialCapacity = 64) {
    this.buf  = new Uint8Array(Math.max(initialCapacity, 16));
    this.view = new DataView(this.buf.buffer);
  }

  /** Bytes written so far. */
  get size(): number {
    return this.pos;
  }

  private ensure(extra: number): void {
    const needed = this.pos + extra;
    if (needed <= this.buf.length) return;

    let capacity = this.buf.length * 2;
    while (capacity < needed) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.pos));
    this.buf  = next;
    this.view = new DataView(next.buffer);
  }

  private pushByte(byte: number): void {
    this.ensure(1);
    this.buf[this.pos++] = byte;
  }

  writeNull(): void {
    // Zero bytes.
  }

  writeBoolean(value: boolean): void {
    this.pushByte(value ? 0x01 : 0x00);
  }

  /** @throws RangeError if `value` is not a signed 32-bit integer. */
  writeInt(value: number): void {
    if (!Number.isInteger(value) || value < Number(INT32_MIN) || value > Number(INT32_MAX)) {
      throw new RangeError(`writeInt: ${value} is not a signed 32-bit integer`);
    }
    let zz = ((value << 1) ^ (value >> 31)) >>> 0;
    while (zz > 0x7f) {
      this.pushByte((zz & 0x7f) | 0x80);
      zz >>>= 7;
    }
    this.pushByte(zz);
  }

  /** @throws RangeError if `value` is not a signed 64-bit integer. */
  writeLong(value: bigint): void {
    if (BigInt.asIntN(64, value) !== value) {
      throw new RangeError(`writeLong: ${value} is not a signed 64-bit integer`);
    }
    let zz = BigInt.asUintN(64, (value << 1n) ^ (value >> 63n));
    while (zz > 0x7fn) {
      this.pushByte(Number(zz & 0x7fn) | 0x80);
      zz >>= 7n;
    }
    this.pushByte(Number(zz));
  }

  writeFloat(value: number): void {
    this.ensure(4);
    this.view.setFloat32(this.pos, value, /* littleEndian */ true);
    this.pos += 4;
  }

  writeDouble(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.pos, value, /* littleEndian */ true);
    this.pos += 8;
  }

  writeBytes(value: Uint8Array): void {
    this.writeLong(BigInt(value.length));
    this.writeFixed(value);
  }

  writeString(value: string): void {
    this.writeBytes(utf8Encoder.encode(value));
  }

  /** Raw bytes with no length prefix (magic, sync markers, pre-encoded records). */
  writeFixed(value: Uint8Array): void {
    this.ensure(value.length);
    this.buf.set(value, this.pos);
    this.pos += value.length;
  }

  /** Copy of the bytes written so far. */
  toBytes(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  reset(): void {
    this.pos = 0;
  }
}
