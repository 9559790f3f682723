/**
 * Little-endian byte writer/reader used by the pattern layout codec.
 */
import { LayoutError } from '../util/errors.js';

export class BinaryWriter {
  private buffer: number[] = [];

  writeU8(val: number): void {
    this.buffer.push(val & 0xff);
  }

  writeU16(val: number): void {
    this.buffer.push(val & 0xff);
    this.buffer.push((val >> 8) & 0xff);
  }

  writeU32(val: number): void {
    this.buffer.push(val & 0xff);
    this.buffer.push((val >> 8) & 0xff);
    this.buffer.push((val >> 16) & 0xff);
    this.buffer.push((val >>> 24) & 0xff);
  }

  writeZeros(count: number): void {
    for (let i = 0; i < count; i++) this.buffer.push(0);
  }

  /**
   * Write exactly `capacity` bytes: `bytes` truncated to fit, then zero
   * padding for whatever is left.
   */
  writeBytes(bytes: Uint8Array, capacity: number): void {
    const n = Math.min(bytes.length, capacity);
    for (let i = 0; i < n; i++) this.buffer.push(bytes[i]);
    this.writeZeros(capacity - n);
  }

  get length(): number {
    return this.buffer.length;
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer);
  }
}

export class BinaryReader {
  private readonly view: DataView;
  private offset: number;

  constructor(private readonly data: Uint8Array, offset = 0) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.offset = offset;
  }

  private ensure(size: number): void {
    if (this.offset + size > this.data.byteLength) {
      throw new LayoutError(`unexpected end of data at offset ${this.offset} (need ${size} more bytes)`);
    }
  }

  readU8(): number {
    this.ensure(1);
    return this.view.getUint8(this.offset++);
  }

  readU16(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return v;
  }

  readU32(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  readBytes(count: number): Uint8Array {
    this.ensure(count);
    const out = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  skip(count: number): void {
    this.ensure(count);
    this.offset += count;
  }

  getOffset(): number {
    return this.offset;
  }
}
