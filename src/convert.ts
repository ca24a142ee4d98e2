/**
 * etcreader — container value conversions
 *
 * Pure projections from decoded container fields to presentation values.
 * None of these carry decode-time invariants; tolerance (placeholder strings,
 * rejected tags) is decided here, not in the decoder.
 */

import { DecodeCursor } from './cursor';
import { buildDescriptor } from './format';
import { CONTAINER_PROFILE, GUID_SIZE } from './layout';
import type { PrimitiveType } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

export class ContainerFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContainerFormatError';
  }
}

// ─── Enumerations ─────────────────────────────────────────────────────────────

export const CURVE_TYPES = ['IRF', 'Decay', 'Spectrum', 'Arbitrary'] as const;

export const ANISOTROPY_TYPES = ['VH', 'VV', 'VM', 'HH', 'HV', 'HM', 'AA'] as const;

export const MEASUREMENT_CONTEXTS = [
  'Unknown',
  'Decay',
  'TRES',
  'AnisoDecay',
  'DecayTempSeries',
  'DecayTimeSeries',
  'FluorSpec',
  'ExSpec',
  'FluorAnisoSpec',
  'ExAnisoSpec',
  'FluorSpecTimeSeries',
  'ExSpecTimeSeries',
  'FluorSpecTempSeries',
  'ExSpecTempSeries',
] as const;

export type CurveType          = typeof CURVE_TYPES[number];
export type AnisotropyType     = typeof ANISOTROPY_TYPES[number];
export type MeasurementContext = typeof MEASUREMENT_CONTEXTS[number];

function lookupName<T extends string>(names: readonly T[], value: number, what: string): T {
  const name = Number.isInteger(value) ? names[value] : undefined;
  if (name === undefined) {
    throw new ContainerFormatError(`Unknown ${what} ${value}.`);
  }
  return name;
}

export function curveType(value: number): CurveType {
  return lookupName(CURVE_TYPES, value, 'curve type');
}

export function anisotropy(value: number): AnisotropyType {
  return lookupName(ANISOTROPY_TYPES, value, 'anisotropy');
}

export function measurementContext(value: number): MeasurementContext {
  return lookupName(MEASUREMENT_CONTEXTS, value, 'measurement context');
}

// ─── Strings ──────────────────────────────────────────────────────────────────

/**
 * ASCII text of `bytes`. Absent strings read as '' and strings with any byte
 * outside ASCII read as '?'.
 */
export function safeDecodeString(bytes: Uint8Array | null): string {
  if (bytes === null) return '';
  let out = '';
  for (const byte of bytes) {
    if (byte > 0x7f) return '?';
    out += String.fromCharCode(byte);
  }
  return out;
}

/** Remove NUL bytes from both ends of `bytes`. */
export function stripNul(bytes: Uint8Array): Uint8Array {
  let start = 0;
  let end   = bytes.length;
  while (start < end && bytes[start] === 0) start++;
  while (end > start && bytes[end - 1] === 0) end--;
  return bytes.subarray(start, end);
}

// ─── GUID ─────────────────────────────────────────────────────────────────────

function hex(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) out += byte.toString(16).padStart(2, '0');
  return out;
}

function reversed(bytes: Uint8Array): Uint8Array {
  return bytes.slice().reverse();
}

/**
 * Format 16 stored GUID bytes as text.
 *
 * The first three groups (4, 2, 2 bytes) are stored little-endian and are
 * reversed; the last two (2, 6 bytes) are stored in display order.
 */
export function bytesToGuid(bytes: Uint8Array): string {
  if (bytes.length < GUID_SIZE) {
    throw new ContainerFormatError(`GUID needs ${GUID_SIZE} bytes; got ${bytes.length}.`);
  }
  return [
    hex(reversed(bytes.subarray(0, 4))),
    hex(reversed(bytes.subarray(4, 6))),
    hex(reversed(bytes.subarray(6, 8))),
    hex(bytes.subarray(8, 10)),
    hex(bytes.subarray(10, 16)),
  ].join('-');
}

// ─── Dates ────────────────────────────────────────────────────────────────────

const MS_PER_DAY = 86_400_000;

/** Day 0 of an OLE automation date: 1899-12-30 00:00 UTC. */
export const OLE_EPOCH_MS = Date.UTC(1899, 11, 30);

/** Convert a (fractional) OLE automation day count to a Date. */
export function oleDaysToDate(days: number): Date {
  return new Date(OLE_EPOCH_MS + Math.round(days * MS_PER_DAY));
}

// ─── Tagged parameter values ──────────────────────────────────────────────────

export type ParameterData = number | bigint | string;

export const PAR_TYPE_INTEGER = 0;
export const PAR_TYPE_FLOAT   = 1;
export const PAR_TYPE_STRING  = 2;

function readSingle(type: PrimitiveType, data: Uint8Array): number | bigint {
  const [value] = new DecodeCursor(data).read(buildDescriptor(type, CONTAINER_PROFILE));
  if (typeof value !== 'number' && typeof value !== 'bigint') {
    throw new ContainerFormatError(`Parameter of type '${type}' did not decode to a number.`);
  }
  return value;
}

/**
 * Interpret a parameter payload by its ParType tag:
 *   0  integer (Size 4 → i32, Size 8 → i64 as bigint)
 *   1  float   (Size 8 → f64)
 *   2  ASCII string
 */
export function parameterData(parType: number, size: number, data: Uint8Array | null): ParameterData {
  const bytes = data ?? new Uint8Array(0);

  switch (parType) {
    case PAR_TYPE_INTEGER:
      if (size === 4) return readSingle('i32', bytes);
      if (size === 8) return readSingle('i64', bytes);
      throw new ContainerFormatError(`Invalid size ${size} for an integer parameter.`);

    case PAR_TYPE_FLOAT:
      if (size === 8) return readSingle('f64', bytes);
      throw new ContainerFormatError(`Invalid size ${size} for a float parameter.`);

    case PAR_TYPE_STRING:
      return safeDecodeString(data);

    default:
      throw new ContainerFormatError(`Unknown parameter type ${parType}.`);
  }
}
