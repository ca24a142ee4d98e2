/**
 * etcreader — format descriptor builder
 *
 * Maps (primitive type, byte-order profile, repeat count) to the descriptor a
 * DecodeCursor reads. Only two types take a count other than 1:
 *
 *   pad         count = bytes to skip, no value produced
 *   char_array  count = byte length of the single opaque value
 *
 * Runs of any other primitive are not a descriptor; a schema expresses them as
 * a list of single-field records.
 */

import { FORMAT_CODES, HOST_LITTLE_ENDIAN, PROFILE_SIGILS } from './constants';
import { SchemaError } from './errors';
import {
  PRIMITIVE_BYTE_WIDTHS,
  type ByteOrderProfile,
  type ByteOrderSigil,
  type PrimitiveType,
} from './types';

export interface FormatDescriptor {
  readonly type:         PrimitiveType;
  readonly sigil:        ByteOrderSigil;
  readonly count:        number;
  /** Exact number of bytes the cursor consumes. */
  readonly byteLength:   number;
  readonly littleEndian: boolean;
  /** Struct-style rendering, e.g. '<i', '<16s', '<3x'. */
  readonly format:       string;
}

export function isPrimitiveType(value: unknown): value is PrimitiveType {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(FORMAT_CODES, value);
}

export function isByteOrderProfile(value: unknown): value is ByteOrderProfile {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PROFILE_SIGILS, value);
}

export function profileSigil(profile: ByteOrderProfile): ByteOrderSigil {
  if (!isByteOrderProfile(profile)) {
    throw new SchemaError(`Unknown byte-order profile '${String(profile)}'.`);
  }
  return PROFILE_SIGILS[profile];
}

export function isLittleEndian(sigil: ByteOrderSigil): boolean {
  switch (sigil) {
    case '<':
      return true;
    case '>':
    case '!':
      return false;
    case '@':
    case '=':
      return HOST_LITTLE_ENDIAN;
  }
}

/**
 * Build the descriptor for `count` of `type` under `profile`.
 *
 * Throws SchemaError for an unknown type, a count that is not a non-negative
 * safe integer, or a count other than 1 on a type that only decodes singly.
 */
export function buildDescriptor(
  type:    PrimitiveType,
  profile: ByteOrderProfile,
  count:   number = 1,
): FormatDescriptor {
  const sigil = profileSigil(profile);

  if (!Number.isSafeInteger(count) || count < 0) {
    throw new SchemaError(`buildDescriptor: repeat count must be a non-negative integer; got ${count}.`);
  }

  switch (type) {
    case 'pad':
    case 'char_array':
      return describe(type, sigil, count, count, `${sigil}${count}${FORMAT_CODES[type]}`);

    case 'bool':
    case 'char':
    case 'u8':
    case 'u16':
    case 'u32':
    case 'u64':
    case 'i8':
    case 'i16':
    case 'i32':
    case 'i64':
    case 'f16':
    case 'f32':
    case 'f64':
      if (count !== 1) {
        throw new SchemaError(
          `buildDescriptor: '${type}' decodes one element at a time; got repeat count ${count}. ` +
          `Express runs of '${type}' as a list of single-field records.`,
        );
      }
      return describe(type, sigil, 1, PRIMITIVE_BYTE_WIDTHS[type], `${sigil}${FORMAT_CODES[type]}`);

    default: {
      const unknown: never = type;
      throw new SchemaError(`buildDescriptor: unknown primitive type '${String(unknown)}'.`);
    }
  }
}

function describe(
  type:       PrimitiveType,
  sigil:      ByteOrderSigil,
  count:      number,
  byteLength: number,
  format:     string,
): FormatDescriptor {
  return { type, sigil, count, byteLength, littleEndian: isLittleEndian(sigil), format };
}
