/**
 * etcreader — schema declaration model
 *
 * A record is declared once, as an object literal whose key order is the
 * field order on the wire:
 *
 *   const Param = defineRecord('Param', {
 *     NameLength: 'i32',
 *     Name:       sized('char_array', 'NameLength'),
 *     Count:      'u16',
 *     Items:      listOf(Item, 'Count'),
 *   }, { profile: 'little_endian' });
 *
 * A string length names an earlier sibling whose decoded integer supplies the
 * length at decode time. Only backward references exist: the referenced field
 * has always been decoded by the time the reference is read.
 *
 * defineRecord() validates the declaration so that schema defects surface at
 * definition time. The decode engine repeats the checks it depends on, since a
 * RecordNode may also be built by hand.
 */

import { INTERNAL_FIELD_MARKER } from './constants';
import { SchemaError } from './errors';
import { isByteOrderProfile, isPrimitiveType } from './format';
import {
  PRIMITIVE_BYTE_WIDTHS,
  type ByteOrderProfile,
  type FieldDeclaration,
  type IntegerType,
  type LengthSpec,
  type PrimitiveNode,
  type PrimitiveType,
  type RecordNode,
  type SchemaNode,
  type SizedNode,
} from './types';

/** What a field may be declared as: a primitive name or any schema node. */
export type FieldInput = PrimitiveType | SchemaNode;

export interface RecordOptions {
  readonly profile?: ByteOrderProfile;
}

const INTEGER_TYPES = new Set<PrimitiveType>([
  'u8', 'u16', 'u32', 'u64', 'i8', 'i16', 'i32', 'i64',
] satisfies IntegerType[]);

// Keys of this shape are enumerated before all others by the JS object model,
// so declaration order would not survive.
const INTEGER_LIKE_KEY = /^(0|[1-9]\d*)$/;

export function isInternalField(name: string): boolean {
  return name.startsWith(INTERNAL_FIELD_MARKER);
}

/** True when `type` is a primitive that decodes a variable run of bytes. */
export function isByteRun(type: PrimitiveType): boolean {
  return type === 'char_array' || type === 'pad';
}

// ─── Node Builders ────────────────────────────────────────────────────────────

export function primitive(type: PrimitiveType): PrimitiveNode {
  if (!isPrimitiveType(type)) {
    throw new SchemaError(`primitive: unknown primitive type '${String(type)}'.`);
  }
  return { kind: 'primitive', type };
}

/**
 * A length-qualified field. With a primitive element, `length` is a byte count
 * for char_array and pad, and must resolve to 0 or 1 for every other type.
 * With a record element the field decodes to an array of `length` records,
 * or null when the length is 0.
 */
export function sized(element: PrimitiveType | PrimitiveNode | RecordNode, length: LengthSpec): SizedNode {
  const node = typeof element === 'string' ? primitive(element) : element;
  return { kind: 'sized', element: node, list: false, length };
}

/** A list of `length` records; decodes to [] when the length is 0. */
export function listOf(element: RecordNode, length: LengthSpec): SizedNode {
  return { kind: 'sized', element, list: true, length };
}

/** `width` bytes that are skipped and produce no key. */
export function padding(width: number): SizedNode {
  return sized('pad', width);
}

// ─── defineRecord ─────────────────────────────────────────────────────────────

/**
 * Declare a record type.
 *
 * Throws SchemaError when:
 *   - a field name is integer-like (object key order would not be field order)
 *     or is __proto__
 *   - a field names an unknown primitive type or profile
 *   - a length reference does not name an earlier, decoded, integer sibling
 *   - a literal length is not a non-negative integer
 *   - a primitive other than char_array / pad has a literal length above 1
 *   - a list has a primitive element
 */
export function defineRecord(
  name:    string,
  fields:  Readonly<Record<string, FieldInput>>,
  options: RecordOptions = {},
): RecordNode {
  if (name.length === 0) {
    throw new SchemaError('defineRecord: record name must not be empty.');
  }
  if (options.profile !== undefined && !isByteOrderProfile(options.profile)) {
    throw new SchemaError(`defineRecord: ${name} declares unknown profile '${String(options.profile)}'.`);
  }

  const declared = new Map<string, SchemaNode>();
  const resolved: FieldDeclaration[] = [];

  for (const [fieldName, input] of Object.entries(fields)) {
    const path = `${name}.${fieldName}`;

    if (INTEGER_LIKE_KEY.test(fieldName)) {
      throw new SchemaError(
        `defineRecord: field name '${path}' is integer-like; ` +
        `such keys do not keep their declaration order.`,
        path,
      );
    }
    if (fieldName === '__proto__') {
      throw new SchemaError(
        `defineRecord: field name '${path}' would set the prototype of the decoded record.`,
        path,
      );
    }

    const node = toNode(input, path);
    if (!isInternalField(fieldName)) {
      validateNode(node, declared, path);
      declared.set(fieldName, node);
    }
    resolved.push({ name: fieldName, node });
  }

  return options.profile !== undefined
    ? { kind: 'record', name, profile: options.profile, fields: resolved }
    : { kind: 'record', name, fields: resolved };
}

function toNode(input: FieldInput, path: string): SchemaNode {
  if (typeof input === 'string') {
    if (!isPrimitiveType(input)) {
      throw new SchemaError(`defineRecord: '${path}' names unknown primitive type '${input}'.`, path);
    }
    return { kind: 'primitive', type: input };
  }
  return input;
}

function validateNode(node: SchemaNode, siblings: ReadonlyMap<string, SchemaNode>, path: string): void {
  switch (node.kind) {
    case 'primitive':
      if (!isPrimitiveType(node.type)) {
        throw new SchemaError(`defineRecord: '${path}' names unknown primitive type '${String(node.type)}'.`, path);
      }
      return;

    case 'record':
      return;

    case 'sized':
      validateLength(node.length, siblings, path);
      if (node.element.kind === 'primitive') {
        const type = node.element.type;
        if (!isPrimitiveType(type)) {
          throw new SchemaError(`defineRecord: '${path}' names unknown primitive type '${String(type)}'.`, path);
        }
        if (node.list) {
          throw new SchemaError(
            `defineRecord: '${path}' is a list of '${type}'. ` +
            `Lists take record elements; wrap '${type}' in a single-field record.`,
            path,
          );
        }
        if (!isByteRun(type) && typeof node.length === 'number' && node.length > 1) {
          throw new SchemaError(
            `defineRecord: '${path}' repeats '${type}' ${node.length} times; ` +
            `only char_array and pad take a length above 1.`,
            path,
          );
        }
      }
      return;
  }
}

function validateLength(length: LengthSpec, siblings: ReadonlyMap<string, SchemaNode>, path: string): void {
  if (typeof length === 'number') {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new SchemaError(`defineRecord: '${path}' has invalid length ${length}.`, path);
    }
    return;
  }

  const target = siblings.get(length);
  if (target === undefined) {
    throw new SchemaError(
      `defineRecord: '${path}' takes its length from '${length}', ` +
      `which is not a field declared before it.`,
      path,
    );
  }
  if (target.kind !== 'primitive' || !INTEGER_TYPES.has(target.type)) {
    throw new SchemaError(
      `defineRecord: '${path}' takes its length from '${length}', which is not an integer field.`,
      path,
    );
  }
}

// ─── Size ─────────────────────────────────────────────────────────────────────

/**
 * Smallest number of bytes any buffer matching `node` can hold: the
 * fixed-size prefix. Fields whose length comes from a sibling count as 0.
 */
export function minimumByteLength(node: SchemaNode): number {
  switch (node.kind) {
    case 'primitive':
      return PRIMITIVE_BYTE_WIDTHS[node.type];

    case 'sized': {
      if (typeof node.length === 'string') return 0;
      const element = node.element;
      return element.kind === 'primitive'
        ? node.length * PRIMITIVE_BYTE_WIDTHS[element.type]
        : node.length * minimumByteLength(element);
    }

    case 'record': {
      let total = 0;
      for (const f of node.fields) {
        if (!isInternalField(f.name)) total += minimumByteLength(f.node);
      }
      return total;
    }
  }
}
