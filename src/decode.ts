/**
 * etcreader — recursive decode engine
 *
 * Walks a schema tree against a DecodeCursor:
 *
 *   primitive  one-element descriptor under the current profile
 *   sized      resolve the length (literal or earlier sibling), then either a
 *              bulk byte read or `length` record decodes
 *   record     own profile (or the caller's), fields in declaration order,
 *              the partial record passed down for length references
 *
 * Profile and enclosing record are plain parameters; there is no ambient
 * decode state.
 */

import { DEFAULT_PROFILE, ROOT_PATH } from './constants';
import { DecodeCursor } from './cursor';
import { BufferUnderrunError, MalformedDataError, SchemaError } from './errors';
import { buildDescriptor, isPrimitiveType } from './format';
import { isByteRun, isInternalField, minimumByteLength } from './schema';
import type {
  ByteOrderProfile,
  DecodedRecord,
  DecodedScalar,
  DecodedValue,
  DecodeResult,
  LengthSpec,
  PrimitiveType,
  RecordNode,
  SchemaNode,
  SizedNode,
} from './types';

// ─── Entry points ─────────────────────────────────────────────────────────────

/**
 * Decode `bytes` against the root record `schema`.
 *
 * Bytes past the end of the record are ignored. Throws BufferUnderrunError
 * when `bytes` cannot hold the schema's fixed-size prefix or a read runs past
 * the end, SchemaError for schema defects and MalformedDataError for decoded
 * lengths that cannot be lengths. No partial record is ever returned.
 */
export function decode(schema: RecordNode, bytes: Uint8Array | ArrayBuffer): DecodedRecord {
  return decodeWithSize(schema, bytes).record;
}

/** Like decode(), also reporting how many bytes the record consumed. */
export function decodeWithSize(schema: RecordNode, bytes: Uint8Array | ArrayBuffer): DecodeResult {
  const cursor  = new DecodeCursor(bytes);
  const minimum = minimumByteLength(schema);
  if (cursor.byteLength < minimum) {
    throw new BufferUnderrunError(0, minimum, cursor.byteLength, schema.name);
  }

  const record = decodeRecord(schema, cursor, schema.profile ?? DEFAULT_PROFILE, schema.name || ROOT_PATH);
  return { record, bytesRead: cursor.offset };
}

// ─── Dispatch ─────────────────────────────────────────────────────────────────

/**
 * Decode one schema node at the cursor.
 *
 * Returns undefined only for padding, which contributes no key to its record.
 * `enclosing` holds the siblings already decoded in the current record.
 */
export function decodeNode(
  node:       SchemaNode,
  cursor:     DecodeCursor,
  profile:    ByteOrderProfile,
  enclosing?: Readonly<DecodedRecord>,
  path:       string = ROOT_PATH,
): DecodedValue | undefined {
  switch (node.kind) {
    case 'primitive': return readScalar(node.type, cursor, profile, 1, path);
    case 'sized':     return decodeSized(node, cursor, profile, enclosing, path);
    case 'record':    return decodeRecord(node, cursor, profile, path);
  }
}

/** Decode every non-internal field of `node`, in declaration order. */
export function decodeRecord(
  node:      RecordNode,
  cursor:    DecodeCursor,
  inherited: ByteOrderProfile,
  path:      string = node.name,
): DecodedRecord {
  const profile = node.profile ?? inherited;
  const record: DecodedRecord = {};

  for (const field of node.fields) {
    if (isInternalField(field.name)) continue;
    const value = decodeNode(field.node, cursor, profile, record, `${path}.${field.name}`);
    if (value !== undefined) record[field.name] = value;
  }
  return record;
}

// ─── Length-qualified fields ──────────────────────────────────────────────────

function decodeSized(
  node:      SizedNode,
  cursor:    DecodeCursor,
  profile:   ByteOrderProfile,
  enclosing: Readonly<DecodedRecord> | undefined,
  path:      string,
): DecodedValue | undefined {
  const element = node.element;

  if (element.kind === 'primitive' && node.list) {
    throw new SchemaError(
      `decode: '${path}' is a list of '${String(element.type)}'; lists take record elements.`,
      path,
    );
  }

  const length = resolveLength(node.length, enclosing, path);
  if (length === 0) {
    // Padding never contributes a key, whatever its width.
    if (element.kind === 'primitive' && element.type === 'pad') return undefined;
    return node.list ? [] : null;
  }

  if (element.kind === 'primitive') {
    const type = element.type;
    if (!isPrimitiveType(type)) {
      throw new SchemaError(`decode: '${path}' names unknown primitive type '${String(type)}'.`, path);
    }
    if (!isByteRun(type) && length !== 1) {
      throw new SchemaError(
        `decode: '${path}' repeats '${type}' ${length} times; only char_array and pad take a length above 1.`,
        path,
      );
    }
    return readScalar(type, cursor, profile, length, path);
  }

  // Guard the repeat count before looping: a corrupt count would otherwise
  // spin through records until the first underrun.
  const perRecord = minimumByteLength(element);
  if (perRecord > 0 && length * perRecord > cursor.remaining) {
    throw new BufferUnderrunError(cursor.offset, length * perRecord, cursor.remaining, path);
  }

  const items: DecodedRecord[] = [];
  for (let i = 0; i < length; i++) {
    items.push(decodeRecord(element, cursor, profile, `${path}[${i}]`));
  }
  return items;
}

/**
 * A literal is used as-is. A name is looked up among the siblings decoded so
 * far; absence means the schema referenced a field that does not precede it.
 */
function resolveLength(
  length:    LengthSpec,
  enclosing: Readonly<DecodedRecord> | undefined,
  path:      string,
): number {
  if (typeof length === 'number') {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new SchemaError(`decode: '${path}' has invalid length ${length}.`, path);
    }
    return length;
  }

  if (enclosing === undefined) {
    throw new SchemaError(
      `decode: '${path}' takes its length from '${length}' but is not being decoded inside a record.`,
      path,
    );
  }
  if (!Object.prototype.hasOwnProperty.call(enclosing, length)) {
    throw new SchemaError(
      `decode: '${path}' takes its length from '${length}', which has not been decoded in this record.`,
      path,
    );
  }

  const raw = enclosing[length];
  if (typeof raw === 'bigint') {
    if (raw < 0n || raw > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MalformedDataError(`decode: '${path}' has out-of-range length ${raw} (from '${length}').`, path);
    }
    return Number(raw);
  }
  if (typeof raw !== 'number' || !Number.isInteger(raw)) {
    throw new SchemaError(`decode: '${path}' takes its length from '${length}', which is not an integer field.`, path);
  }
  if (raw < 0) {
    throw new MalformedDataError(`decode: '${path}' has negative length ${raw} (from '${length}').`, path);
  }
  return raw;
}

// ─── Scalars ──────────────────────────────────────────────────────────────────

function readScalar(
  type:    PrimitiveType,
  cursor:  DecodeCursor,
  profile: ByteOrderProfile,
  count:   number,
  path:    string,
): DecodedScalar | undefined {
  const [value] = cursor.read(buildDescriptor(type, profile, count), path);
  return value;
}
