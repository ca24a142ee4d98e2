/**
 * etcreader — DecodeCursor
 *
 * A byte buffer plus one mutable read offset. read() consumes exactly
 * descriptor.byteLength bytes or throws without moving.
 *
 * The cursor wraps the caller's bytes without copying them. Byte-string values
 * are copied out on read, so nothing returned from a decode aliases the
 * caller's buffer.
 *
 * One cursor serves one decode. Decoding several buffers concurrently means
 * one cursor per buffer; a cursor is never shared.
 */

import { BufferUnderrunError } from './errors';
import type { FormatDescriptor } from './format';
import type { DecodedScalar } from './types';

export class DecodeCursor {
  private readonly _bytes: Uint8Array;
  private readonly _view:  DataView;
  private _offset = 0;

  constructor(bytes: Uint8Array | ArrayBuffer) {
    // Re-wrap as a plain Uint8Array: Buffer.prototype.slice returns a view, not a copy.
    this._bytes = bytes instanceof Uint8Array
      ? new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength)
      : new Uint8Array(bytes);
    this._view  = new DataView(this._bytes.buffer, this._bytes.byteOffset, this._bytes.byteLength);
  }

  /** Bytes consumed so far. */
  get offset(): number {
    return this._offset;
  }

  get byteLength(): number {
    return this._bytes.byteLength;
  }

  get remaining(): number {
    return this._bytes.byteLength - this._offset;
  }

  /**
   * Decode one descriptor at the current offset and advance past it.
   *
   * Returns [] for padding and [value] for everything else.
   * `field` only labels the BufferUnderrunError.
   */
  read(descriptor: FormatDescriptor, field?: string): DecodedScalar[] {
    const at  = this._offset;
    const end = at + descriptor.byteLength;
    if (end > this._bytes.byteLength) {
      throw new BufferUnderrunError(at, descriptor.byteLength, this.remaining, field);
    }

    const value = this._decodeAt(descriptor, at, end);
    this._offset = end;
    return value === undefined ? [] : [value];
  }

  private _decodeAt(d: FormatDescriptor, at: number, end: number): DecodedScalar | undefined {
    const v  = this._view;
    const le = d.littleEndian;

    switch (d.type) {
      case 'pad':        return undefined;
      case 'bool':       return v.getUint8(at) !== 0;
      case 'char':
      case 'char_array': return this._bytes.slice(at, end);
      case 'u8':         return v.getUint8(at);
      case 'u16':        return v.getUint16(at, le);
      case 'u32':        return v.getUint32(at, le);
      case 'u64':        return v.getBigUint64(at, le);
      case 'i8':         return v.getInt8(at);
      case 'i16':        return v.getInt16(at, le);
      case 'i32':        return v.getInt32(at, le);
      case 'i64':        return v.getBigInt64(at, le);
      case 'f16':        return halfToFloat(v.getUint16(at, le));
      case 'f32':        return v.getFloat32(at, le);
      case 'f64':        return v.getFloat64(at, le);
    }
  }
}

// ─── IEEE 754 binary16 ────────────────────────────────────────────────────────

// DataView.getFloat16 is not available on Node.js 20.
function halfToFloat(bits: number): number {
  const sign     = bits & 0x8000 ? -1 : 1;
  const exponent = (bits >> 10) & 0x1f;
  const fraction = bits & 0x03ff;

  if (exponent === 0)    return sign * fraction * 2 ** -24;          // zero / subnormal
  if (exponent === 0x1f) return fraction === 0 ? sign * Infinity : NaN;
  return sign * (1 + fraction / 1024) * 2 ** (exponent - 15);
}
