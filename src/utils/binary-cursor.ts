/**
 * Sequential reader over a byte buffer with a fixed byte order.
 * Used for the file header, block headers and the structure-type table.
 */

import { SceneBinaryError } from '../types/errors.js';

export class BinaryCursor {
  private offset: number;

  constructor(
    private readonly buffer: Buffer,
    private readonly littleEndian: boolean,
    offset = 0,
    private readonly end: number = buffer.length,
  ) {
    this.offset = offset;
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.end - this.offset;
  }

  seek(offset: number): void {
    this.offset = offset;
  }

  skip(length: number): void {
    this.ensureAvailable(length);
    this.offset += length;
  }

  /**
   * Advances to the next multiple of `alignment`, measured from `base`.
   */
  align(alignment: number, base = 0): void {
    const relative = this.offset - base;
    const padding = (alignment - (relative % alignment)) % alignment;
    this.offset = Math.min(this.offset + padding, this.end);
  }

  readUint16(): number {
    this.ensureAvailable(2);
    const value = this.littleEndian ? this.buffer.readUInt16LE(this.offset) : this.buffer.readUInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  readInt16(): number {
    this.ensureAvailable(2);
    const value = this.littleEndian ? this.buffer.readInt16LE(this.offset) : this.buffer.readInt16BE(this.offset);
    this.offset += 2;
    return value;
  }

  readUint32(): number {
    this.ensureAvailable(4);
    const value = this.littleEndian ? this.buffer.readUInt32LE(this.offset) : this.buffer.readUInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readInt32(): number {
    this.ensureAvailable(4);
    const value = this.littleEndian ? this.buffer.readInt32LE(this.offset) : this.buffer.readInt32BE(this.offset);
    this.offset += 4;
    return value;
  }

  readUint64(): bigint {
    this.ensureAvailable(8);
    const value = this.littleEndian ? this.buffer.readBigUInt64LE(this.offset) : this.buffer.readBigUInt64BE(this.offset);
    this.offset += 8;
    return value;
  }

  readInt64(): bigint {
    this.ensureAvailable(8);
    const value = this.littleEndian ? this.buffer.readBigInt64LE(this.offset) : this.buffer.readBigInt64BE(this.offset);
    this.offset += 8;
    return value;
  }

  /** Reads an address of the given width (4 or 8 bytes). */
  readPointer(pointerSize: number): bigint {
    return pointerSize === 8 ? this.readUint64() : BigInt(this.readUint32());
  }

  readAscii(length: number): string {
    this.ensureAvailable(length);
    const value = this.buffer.toString('latin1', this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  /** Reads a NUL-terminated string and skips the terminator. */
  readCString(): string {
    const terminator = this.buffer.indexOf(0, this.offset);
    if (terminator < 0 || terminator >= this.end) {
      throw new SceneBinaryError(`Unterminated string at offset ${this.offset}`);
    }
    const value = this.buffer.toString('latin1', this.offset, terminator);
    this.offset = terminator + 1;
    return value;
  }

  private ensureAvailable(length: number): void {
    if (this.offset + length > this.end) {
      throw new SceneBinaryError(`Unexpected end of data: need ${length} bytes at offset ${this.offset}, ${this.end - this.offset} available`);
    }
  }
}
