/**
 * Byte cursors over in-memory buffers.
 *
 * `ByteReader` walks a borrowed `Uint8Array` front to back and never copies
 * it; `readExact` hands out subarray views. `ByteWriter` appends into a
 * growable buffer and copies out once on `finish()`.
 *
 * Multi-byte integers are little-endian throughout.
 */

import { MarshalError } from './errors.js';

export class ByteReader {
  private readonly view: DataView;
  private pos = 0;

  constructor(private readonly buffer: Uint8Array) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  position(): number {
    return this.pos;
  }

  remaining(): number {
    return this.buffer.length - this.pos;
  }

  /** Borrow the next `n` bytes. The view aliases the source buffer. */
  readExact(n: number): Uint8Array {
    this.require(n);
    const out = this.buffer.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  readU8(): number {
    this.require(1);
    return this.buffer[this.pos++];
  }

  /** Signed byte, used by the fixnum prefix. */
  readI8(): number {
    this.require(1);
    const v = this.view.getInt8(this.pos);
    this.pos += 1;
    return v;
  }

  readU16(): number {
    this.require(2);
    const v = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return v;
  }

  readU32(): number {
    this.require(4);
    const v = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return v;
  }

  readI32(): number {
    this.require(4);
    const v = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return v;
  }

  readF64(): number {
    this.require(8);
    const v = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return v;
  }

  /** Fail with `TrailingData` unless the whole buffer was consumed. */
  expectEnd(): void {
    const left = this.remaining();
    if (left !== 0) {
      throw new MarshalError('TrailingData', `${left} byte(s) left after the top-level value at offset ${this.pos}`);
    }
  }

  private require(n: number): void {
    if (n < 0 || this.pos + n > this.buffer.length) {
      throw new MarshalError(
        'UnexpectedEnd',
        `needed ${n} byte(s) at offset ${this.pos}, ${this.remaining()} available`,
      );
    }
  }
}

export class ByteWriter {
  private buf: Uint8Array;
  private view: DataView;
  private pos = 0;

  constructor(initialCapacity = 256) {
    this.buf = new Uint8Array(Math.max(initialCapacity, 16));
    this.view = new DataView(this.buf.buffer);
  }

  position(): number {
    return this.pos;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buf.set(data, this.pos);
    this.pos += data.length;
  }

  writeU8(v: number): void {
    this.grow(1);
    this.view.setUint8(this.pos, v);
    this.pos += 1;
  }

  writeI8(v: number): void {
    this.grow(1);
    this.view.setInt8(this.pos, v);
    this.pos += 1;
  }

  writeU16(v: number): void {
    this.grow(2);
    this.view.setUint16(this.pos, v, true);
    this.pos += 2;
  }

  writeU32(v: number): void {
    this.grow(4);
    this.view.setUint32(this.pos, v, true);
    this.pos += 4;
  }

  writeI32(v: number): void {
    this.grow(4);
    this.view.setInt32(this.pos, v, true);
    this.pos += 4;
  }

  writeF64(v: number): void {
    this.grow(8);
    this.view.setFloat64(this.pos, v, true);
    this.pos += 8;
  }

  /** Copy out the written bytes. */
  finish(): Uint8Array {
    return this.buf.slice(0, this.pos);
  }

  private grow(n: number): void {
    if (this.pos + n <= this.buf.length) return;
    let capacity = this.buf.length;
    while (capacity < this.pos + n) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.pos));
    this.buf = next;
    this.view = new DataView(next.buffer);
  }
}
