/**
 * etcreader — typed accessors for decoded records
 *
 * A DecodedRecord is a loose map; these helpers read one key and check its
 * shape, so that consumers of a decode never cast. Each throws
 * FieldAccessError naming the key when the value is missing or of another kind.
 */

import { FieldAccessError } from './errors';
import type { DecodedRecord, DecodedValue } from './types';

function lookup(record: Readonly<DecodedRecord>, key: string): DecodedValue {
  if (!Object.prototype.hasOwnProperty.call(record, key)) {
    throw new FieldAccessError(`Decoded record has no field '${key}'.`, key);
  }
  return record[key];
}

function describe(value: DecodedValue): string {
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return 'bytes';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

function mismatch(key: string, expected: string, value: DecodedValue): FieldAccessError {
  return new FieldAccessError(`Field '${key}' is ${describe(value)}, expected ${expected}.`, key);
}

function isRecord(value: DecodedValue): value is DecodedRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

/** Any float or 8/16/32-bit integer field. */
export function getNumber(record: Readonly<DecodedRecord>, key: string): number {
  const value = lookup(record, key);
  if (typeof value !== 'number') throw mismatch(key, 'number', value);
  return value;
}

/** Any integer field, 64-bit ones included when they fit in a safe integer. */
export function getInteger(record: Readonly<DecodedRecord>, key: string): number {
  const value = lookup(record, key);
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'bigint') {
    if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FieldAccessError(`Field '${key}' holds ${value}, outside the safe integer range.`, key);
    }
    return Number(value);
  }
  throw mismatch(key, 'integer', value);
}

/** A byte-string field; null when its length was 0. */
export function getBytes(record: Readonly<DecodedRecord>, key: string): Uint8Array | null {
  const value = lookup(record, key);
  if (value === null || value instanceof Uint8Array) return value;
  throw mismatch(key, 'bytes', value);
}

/** A nested record field. */
export function getRecord(record: Readonly<DecodedRecord>, key: string): DecodedRecord {
  const value = lookup(record, key);
  if (!isRecord(value)) throw mismatch(key, 'record', value);
  return value;
}

/** A repeated record field; [] when its length was 0. */
export function getRecords(record: Readonly<DecodedRecord>, key: string): DecodedRecord[] {
  const value = lookup(record, key);
  if (value === null) return [];
  if (!Array.isArray(value)) throw mismatch(key, 'list', value);
  return value;
}
