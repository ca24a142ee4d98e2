/**
 * etcreader — decoder constants
 *
 * Unpack codes follow the classic struct-format letters so that a descriptor
 * renders as a compact format string in error messages:
 *
 *   x pad   ? bool   c char   s char_array
 *   B u8    H u16    I u32    Q u64
 *   b i8    h i16    i i32    q i64
 *   e f16   f f32    d f64
 */

import type { ByteOrderProfile, ByteOrderSigil, PrimitiveType } from './types';

// ─── Unpack Codes ─────────────────────────────────────────────────────────────

export const FORMAT_CODES: Readonly<Record<PrimitiveType, string>> = {
  pad: 'x', bool: '?', char: 'c', char_array: 's',
  u8:  'B', u16:  'H', u32:  'I', u64:        'Q',
  i8:  'b', i16:  'h', i32:  'i', i64:        'q',
  f16: 'e', f32:  'f', f64:  'd',
};

// ─── Profiles ─────────────────────────────────────────────────────────────────

export const PROFILE_SIGILS: Readonly<Record<ByteOrderProfile, ByteOrderSigil>> = {
  native_size:   '@',
  native:        '=',
  little_endian: '<',
  big_endian:    '>',
  network:       '!',
};

/** Profile used by a root record that declares none. */
export const DEFAULT_PROFILE: ByteOrderProfile = 'native';

/**
 * Host byte order, probed once.
 * [0x01, 0x00] reads as 0x0001 on little-endian hosts and 0x0100 on big-endian.
 */
export const HOST_LITTLE_ENDIAN: boolean =
  new Uint16Array(new Uint8Array([0x01, 0x00]).buffer)[0] === 1;

// ─── Schema ───────────────────────────────────────────────────────────────────

/** Fields whose name starts with this marker are metadata and never decoded. */
export const INTERNAL_FIELD_MARKER = '_';

/** Path label used for a root record in error messages. */
export const ROOT_PATH = '$';
