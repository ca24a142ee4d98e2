/**
 * etcreader — type definitions
 *
 * The schema is a plain tagged tree. Nothing here is inferred from runtime
 * type metadata: every node states its kind, and the decoder dispatches on it.
 */

// ─── Primitive Types ──────────────────────────────────────────────────────────

/**
 * Scalar wire types a schema can name.
 *
 * pad:        Skipped bytes. Produces no value and no key in the record.
 * char:       A single byte, returned as a one-byte Uint8Array.
 * char_array: An opaque byte string. Its width is the declared length, so it
 *             is only meaningful inside a length-qualified field (a bare
 *             char_array reads one byte).
 *
 * u64 / i64 decode to bigint; every other numeric type decodes to number.
 */
export type PrimitiveType =
  | 'pad'
  | 'bool'
  | 'char'
  | 'char_array'
  | 'u8'
  | 'u16'
  | 'u32'
  | 'u64'
  | 'i8'
  | 'i16'
  | 'i32'
  | 'i64'
  | 'f16'
  | 'f32'
  | 'f64';

/** Byte width of one element of each PrimitiveType. */
export const PRIMITIVE_BYTE_WIDTHS: Readonly<Record<PrimitiveType, number>> = {
  pad:        1,
  bool:       1,
  char:       1,
  char_array: 1, // per byte; the field length is the byte count
  u8:         1,
  u16:        2,
  u32:        4,
  u64:        8,
  i8:         1,
  i16:        2,
  i32:        4,
  i64:        8,
  f16:        2,
  f32:        4,
  f64:        8,
};

/** Primitive types whose decoded value may serve as a sibling length. */
export type IntegerType = 'u8' | 'u16' | 'u32' | 'u64' | 'i8' | 'i16' | 'i32' | 'i64';

// ─── Byte-Order Profiles ──────────────────────────────────────────────────────

/**
 * Byte order, size and alignment convention for the scalars of one record.
 *
 * native_size: host byte order, native size and alignment   (@)
 * native:      host byte order, standard size, no alignment (=)
 * little_endian / big_endian: explicit order, standard size (< >)
 * network:     big-endian, standard size                    (!)
 */
export type ByteOrderProfile =
  | 'native_size'
  | 'native'
  | 'little_endian'
  | 'big_endian'
  | 'network';

export type ByteOrderSigil = '@' | '=' | '<' | '>' | '!';

// ─── Schema Nodes ─────────────────────────────────────────────────────────────

export interface PrimitiveNode {
  readonly kind: 'primitive';
  readonly type: PrimitiveType;
}

/**
 * A field whose element count is fixed by the schema (number) or read at
 * decode time from an earlier sibling in the same record (string).
 */
export type LengthSpec = number | string;

export interface SizedNode {
  readonly kind:    'sized';
  readonly element: PrimitiveNode | RecordNode;
  /** "list of" field: decodes to [] rather than null when the length is 0. */
  readonly list:    boolean;
  readonly length:  LengthSpec;
}

export interface FieldDeclaration {
  readonly name: string;
  readonly node: SchemaNode;
}

export interface RecordNode {
  readonly kind:     'record';
  readonly name:     string;
  /** Applies to scalars directly inside this record. Inherited when absent. */
  readonly profile?: ByteOrderProfile;
  readonly fields:   readonly FieldDeclaration[];
}

export type SchemaNode = PrimitiveNode | SizedNode | RecordNode;

// ─── Decoded Values ───────────────────────────────────────────────────────────

export type DecodedScalar = number | bigint | boolean | Uint8Array;

export type DecodedValue = DecodedScalar | DecodedRecord | DecodedRecord[] | null;

/** Field name → decoded value, own keys in schema declaration order. */
export interface DecodedRecord {
  [field: string]: DecodedValue;
}

export interface DecodeResult {
  readonly record:    DecodedRecord;
  /** Bytes consumed from the start of the buffer. Trailing bytes stay unread. */
  readonly bytesRead: number;
}
