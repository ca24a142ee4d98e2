/**
 * etcreader — DecodeCursor
 */

import { describe, it, expect } from 'vitest';
import { BufferUnderrunError, DecodeCursor, buildDescriptor } from '../src/index';

const le = (type: Parameters<typeof buildDescriptor>[0], count = 1) =>
  buildDescriptor(type, 'little_endian', count);
const be = (type: Parameters<typeof buildDescriptor>[0], count = 1) =>
  buildDescriptor(type, 'big_endian', count);

describe('DecodeCursor.read — integers', () => {
  it('decodes the same four bytes per byte order and advances by four', () => {
    const bytes = new Uint8Array([0x01, 0x00, 0x00, 0x00]);

    const little = new DecodeCursor(bytes);
    expect(little.read(le('u32'))).toEqual([1]);
    expect(little.offset).toBe(4);
    expect(little.remaining).toBe(0);

    expect(new DecodeCursor(bytes).read(be('u32'))).toEqual([16777216]);
  });

  it('decodes signed and unsigned 8/16-bit values', () => {
    const cursor = new DecodeCursor(new Uint8Array([0xff, 0xff, 0xfe, 0xff, 0x34, 0x12]));
    expect(cursor.read(le('u8'))).toEqual([255]);
    expect(cursor.read(le('i8'))).toEqual([-1]);
    expect(cursor.read(le('i16'))).toEqual([-2]);
    expect(cursor.read(le('u16'))).toEqual([0x1234]);
  });

  it('decodes 64-bit integers as bigint', () => {
    const ones = new Uint8Array(8).fill(0xff);
    expect(new DecodeCursor(ones).read(le('u64'))).toEqual([18446744073709551615n]);
    expect(new DecodeCursor(ones).read(le('i64'))).toEqual([-1n]);
  });

  it('decodes any non-zero byte as true', () => {
    const cursor = new DecodeCursor(new Uint8Array([0x02, 0x00]));
    expect(cursor.read(le('bool'))).toEqual([true]);
    expect(cursor.read(le('bool'))).toEqual([false]);
  });
});

describe('DecodeCursor.read — floats', () => {
  it('decodes f32 and f64', () => {
    const bytes = new Uint8Array(12);
    const dv    = new DataView(bytes.buffer);
    dv.setFloat32(0, 1.25, true);
    dv.setFloat64(4, -0.5, true);

    const cursor = new DecodeCursor(bytes);
    expect(cursor.read(le('f32'))).toEqual([1.25]);
    expect(cursor.read(le('f64'))).toEqual([-0.5]);
  });

  it('decodes IEEE binary16', () => {
    const read = (lo: number, hi: number) =>
      new DecodeCursor(new Uint8Array([lo, hi])).read(le('f16'))[0];

    expect(read(0x00, 0x3c)).toBe(1);
    expect(read(0x00, 0xc0)).toBe(-2);
    expect(read(0x00, 0x7c)).toBe(Infinity);
    expect(read(0x01, 0x00)).toBe(2 ** -24);
    expect(read(0x01, 0x7c)).toBeNaN();
  });

  it('honours big-endian binary16', () => {
    expect(new DecodeCursor(new Uint8Array([0x3c, 0x00])).read(be('f16'))).toEqual([1]);
  });
});

describe('DecodeCursor.read — byte runs', () => {
  it('returns a char_array as a copy of the source bytes', () => {
    const source = new Uint8Array([1, 2, 3, 4]);
    const cursor = new DecodeCursor(source);
    const [value] = cursor.read(le('char_array', 3));

    source[0] = 99;
    expect(value).toEqual(new Uint8Array([1, 2, 3]));
    expect(cursor.offset).toBe(3);
  });

  it('returns plain Uint8Arrays for Buffer input', () => {
    const [value] = new DecodeCursor(Buffer.from([7, 8])).read(le('char_array', 2));
    expect(Buffer.isBuffer(value)).toBe(false);
    expect(value).toEqual(new Uint8Array([7, 8]));
  });

  it('returns a single char as a one-byte array', () => {
    expect(new DecodeCursor(new Uint8Array([0x41])).read(le('char'))).toEqual([new Uint8Array([0x41])]);
  });

  it('skips padding without producing a value', () => {
    const cursor = new DecodeCursor(new Uint8Array([9, 9, 9, 5]));
    expect(cursor.read(le('pad', 3))).toEqual([]);
    expect(cursor.read(le('u8'))).toEqual([5]);
  });
});

describe('DecodeCursor — buffers', () => {
  it('reads relative to the byteOffset of a view', () => {
    const backing = new Uint8Array([0xaa, 0xbb, 0x02, 0x00]);
    const cursor  = new DecodeCursor(backing.subarray(2));
    expect(cursor.byteLength).toBe(2);
    expect(cursor.read(le('u16'))).toEqual([2]);
  });

  it('accepts an ArrayBuffer', () => {
    const cursor = new DecodeCursor(new Uint8Array([0x00, 0x05]).buffer);
    expect(cursor.read(be('u16'))).toEqual([5]);
  });

  it('throws BufferUnderrunError past the end and does not move', () => {
    const cursor = new DecodeCursor(new Uint8Array([1, 2]));

    let caught: unknown;
    try {
      cursor.read(le('u32'), 'Rec.value');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(BufferUnderrunError);
    expect(caught).toMatchObject({ offset: 0, needed: 4, available: 2, field: 'Rec.value' });
    expect(cursor.offset).toBe(0);
  });
});
