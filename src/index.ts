// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  PrimitiveType,
  IntegerType,
  ByteOrderProfile,
  ByteOrderSigil,
  PrimitiveNode,
  SizedNode,
  RecordNode,
  SchemaNode,
  FieldDeclaration,
  LengthSpec,
  DecodedScalar,
  DecodedValue,
  DecodedRecord,
  DecodeResult,
} from './types';

export { PRIMITIVE_BYTE_WIDTHS } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  FORMAT_CODES,
  PROFILE_SIGILS,
  DEFAULT_PROFILE,
  HOST_LITTLE_ENDIAN,
  INTERNAL_FIELD_MARKER,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  DecodeError,
  SchemaError,
  BufferUnderrunError,
  MalformedDataError,
  FieldAccessError,
} from './errors';

// ─── Format descriptors ───────────────────────────────────────────────────────
export {
  buildDescriptor,
  profileSigil,
  isLittleEndian,
  isPrimitiveType,
  isByteOrderProfile,
} from './format';
export type { FormatDescriptor } from './format';

// ─── Cursor ───────────────────────────────────────────────────────────────────
export { DecodeCursor } from './cursor';

// ─── Schema ───────────────────────────────────────────────────────────────────
export {
  primitive,
  sized,
  listOf,
  padding,
  defineRecord,
  minimumByteLength,
  isInternalField,
} from './schema';
export type { FieldInput, RecordOptions } from './schema';

// ─── Decode ───────────────────────────────────────────────────────────────────
export { decode, decodeWithSize, decodeNode, decodeRecord } from './decode';

export { getNumber, getInteger, getBytes, getRecord, getRecords } from './access';

// ─── EasyTau container ────────────────────────────────────────────────────────
export {
  ContainerFile,
  DataCurve as DataCurveRecord,
  MeasParam,
  SeriesParam,
  SysParam,
  XY,
  CONTAINER_PROFILE,
  CONTAINER_IDENT,
} from './layout';

export {
  ContainerFormatError,
  safeDecodeString,
  bytesToGuid,
  oleDaysToDate,
  parameterData,
  curveType,
  anisotropy,
  measurementContext,
  CURVE_TYPES,
  ANISOTROPY_TYPES,
  MEASUREMENT_CONTEXTS,
} from './convert';
export type { CurveType, AnisotropyType, MeasurementContext, ParameterData } from './convert';

export { parseEtc, readEtcFile } from './reader';
export type {
  EtcFile,
  DataCurve,
  SystemParameter,
  SeriesParameter,
  MeasurementParameter,
} from './reader';
