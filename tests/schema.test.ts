/**
 * etcreader — schema declaration model
 *
 * defineRecord() must reject every schema the decoder could not honour, with
 * an error that names the record and field.
 */

import { describe, it, expect } from 'vitest';
import {
  ContainerFile,
  SysParam,
  SchemaError,
  defineRecord,
  listOf,
  minimumByteLength,
  padding,
  primitive,
  sized,
} from '../src/index';
import type { FieldInput, RecordNode, SizedNode } from '../src/index';

const Point = defineRecord('Point', { x: 'i16', y: 'i16' }, { profile: 'big_endian' });

describe('defineRecord — normalisation', () => {
  it('turns primitive names into primitive nodes, in declaration order', () => {
    expect(Point).toEqual({
      kind:    'record',
      name:    'Point',
      profile: 'big_endian',
      fields:  [
        { name: 'x', node: { kind: 'primitive', type: 'i16' } },
        { name: 'y', node: { kind: 'primitive', type: 'i16' } },
      ],
    });
  });

  it('omits the profile when none is declared', () => {
    const r = defineRecord('Bare', { a: 'u8' });
    expect('profile' in r).toBe(false);
  });

  it('keeps internal fields in the declaration', () => {
    const r = defineRecord('Doc', { _doc: 'u32', a: 'u8' });
    expect(r.fields.map(f => f.name)).toEqual(['_doc', 'a']);
  });

  it('builds length-qualified nodes', () => {
    expect(sized('char_array', 'n')).toEqual({
      kind: 'sized', element: { kind: 'primitive', type: 'char_array' }, list: false, length: 'n',
    });
    expect(listOf(Point, 2)).toEqual({ kind: 'sized', element: Point, list: true, length: 2 });
    expect(padding(3)).toEqual({
      kind: 'sized', element: { kind: 'primitive', type: 'pad' }, list: false, length: 3,
    });
  });
});

describe('defineRecord — length references', () => {
  it('accepts a reference to an earlier integer field', () => {
    expect(() => defineRecord('Ok', { n: 'u16', data: sized('char_array', 'n') })).not.toThrow();
  });

  it('rejects a forward reference', () => {
    expect(() => defineRecord('Fwd', {
      data: sized('char_array', 'n'),
      n:    'i32',
    })).toThrow(/'Fwd\.data' takes its length from 'n', which is not a field declared before it/);
  });

  it('rejects a reference to a non-integer field', () => {
    expect(() => defineRecord('Flt', {
      n:    'f32',
      data: sized('char_array', 'n'),
    })).toThrow(SchemaError);
  });

  it('rejects a reference to an internal field', () => {
    expect(() => defineRecord('Hidden', {
      _n:   'i32',
      data: sized('char_array', '_n'),
    })).toThrow(SchemaError);
  });

  it('reports the offending field on the error', () => {
    let caught: unknown;
    try {
      defineRecord('Where', { data: sized('char_array', 'missing') });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SchemaError);
    expect(caught).toMatchObject({ field: 'Where.data' });
  });
});

describe('defineRecord — repeat counts', () => {
  it('accepts 0 or 1 of a numeric primitive', () => {
    expect(() => defineRecord('One', { a: sized('i32', 1), b: sized('i32', 0) })).not.toThrow();
  });

  it('rejects a run of a numeric primitive', () => {
    expect(() => defineRecord('Run', { a: sized('f32', 4) })).toThrow(/only char_array and pad/);
  });

  it('rejects a list with a primitive element', () => {
    const node: SizedNode = { kind: 'sized', element: primitive('i32'), list: true, length: 2 };
    expect(() => defineRecord('List', { a: node })).toThrow(/Lists take record elements/);
  });

  it('rejects negative or fractional literal lengths', () => {
    expect(() => defineRecord('Neg', { a: sized('char_array', -1) })).toThrow(SchemaError);
    expect(() => defineRecord('Frac', { a: sized('char_array', 2.5) })).toThrow(SchemaError);
  });
});

describe('defineRecord — names and types', () => {
  it('rejects integer-like field names', () => {
    expect(() => defineRecord('Idx', { a: 'u8', 0: 'u8' })).toThrow(/integer-like/);
  });

  it('rejects a __proto__ field name', () => {
    const fields: Record<string, FieldInput> = JSON.parse('{"a":"u8","__proto__":"u8"}');
    expect(Object.keys(fields)).toEqual(['a', '__proto__']);
    expect(() => defineRecord('Proto', fields)).toThrow(/'Proto\.__proto__' would set the prototype/);
  });

  it('rejects an unknown primitive name', () => {
    const fields: Record<string, FieldInput> = JSON.parse('{"a":"u128"}');
    expect(() => defineRecord('Unknown', fields)).toThrow(/unknown primitive type 'u128'/);
  });

  it('rejects an unknown profile', () => {
    const options: { profile: 'native' } = JSON.parse('{"profile":"sideways"}');
    expect(() => defineRecord('Prof', { a: 'u8' }, options)).toThrow(SchemaError);
  });

  it('rejects an empty record name', () => {
    expect(() => defineRecord('', { a: 'u8' })).toThrow(SchemaError);
  });

  it('rejects primitive() with an unknown type', () => {
    const node: { type: 'u8' } = JSON.parse('{"type":"i128"}');
    expect(() => primitive(node.type)).toThrow(SchemaError);
  });
});

describe('minimumByteLength', () => {
  it('sums fixed-width fields and counts referenced lengths as zero', () => {
    const r = defineRecord('Mixed', {
      tag:  'u8',
      gap:  padding(3),
      n:    'i32',
      data: sized('char_array', 'n'),
      id:   sized('char_array', 8),
      pts:  listOf(Point, 2),
      _doc: 'f64',
    });
    // 1 + 3 + 4 + 0 + 8 + 2 × 4; internal fields are never read
    expect(minimumByteLength(r)).toBe(24);
  });

  it('sizes the container prefix', () => {
    // Ident 32, Version 4, GUID 16, CreationDate 8, MeasContext 4, three counts 4 each
    expect(minimumByteLength(ContainerFile)).toBe(76);
    expect(minimumByteLength(SysParam)).toBe(28);
  });

  it('sizes a nested record by its fields', () => {
    const outer: RecordNode = defineRecord('Outer', { p: Point, flag: 'bool' });
    expect(minimumByteLength(outer)).toBe(5);
  });
});
