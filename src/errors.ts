/**
 * etcreader — error types
 *
 * Every failure raised by the decoder extends DecodeError. Schema defects and
 * data defects are distinct classes so a caller can tell a bad schema from a
 * truncated or corrupt file.
 */

export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

/**
 * The schema itself is wrong: unknown primitive, a length reference to a field
 * that does not precede it, a repeat count a primitive cannot take.
 * Never recoverable at decode time.
 */
export class SchemaError extends DecodeError {
  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = 'SchemaError';
  }
}

/** A read would run past the end of the buffer. */
export class BufferUnderrunError extends DecodeError {
  constructor(
    readonly offset:    number,
    readonly needed:    number,
    readonly available: number,
    readonly field?:    string,
  ) {
    super(
      `Buffer underrun${field !== undefined ? ` reading '${field}'` : ''}: ` +
      `need ${needed} bytes at offset ${offset}, ${available} available.`,
    );
    this.name = 'BufferUnderrunError';
  }
}

/** A decoded value cannot be used the way the schema says, e.g. a negative length. */
export class MalformedDataError extends DecodeError {
  constructor(message: string, readonly field?: string) {
    super(message);
    this.name = 'MalformedDataError';
  }
}

/** A consumer asked a decoded record for a key it lacks, or for the wrong type. */
export class FieldAccessError extends DecodeError {
  constructor(message: string, readonly field: string) {
    super(message);
    this.name = 'FieldAccessError';
  }
}
