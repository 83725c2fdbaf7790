/** Stable error codes raised by the engine and its adapters. */
export type ErrorCode =
  | 'INDEX_OUT_OF_RANGE'
  | 'VALUE_OUT_OF_RANGE'
  | 'LENGTH_MISMATCH'
  | 'INVALID_LENGTH'
  | 'DUPLICATE_ATTRIBUTE'
  | 'UNKNOWN_ATTRIBUTE'
  | 'GENERATION_LIMIT';

/** Base class for every error thrown by fd-normalizer. */
export class FdNormalizerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A bit position outside `[0, length)` was addressed. */
export class IndexOutOfRangeError extends FdNormalizerError {
  readonly position: number;
  readonly length: number;

  constructor(position: number, length: number) {
    super(
      'INDEX_OUT_OF_RANGE',
      `Bit position ${String(position)} is out of range for an attribute set of length ${String(length)}.`,
    );
    this.position = position;
    this.length = length;
  }
}

/** A bit vector holds bits outside `[0, length)`, or is negative. */
export class ValueOutOfRangeError extends FdNormalizerError {
  readonly value: bigint;
  readonly length: number;

  constructor(value: bigint, length: number) {
    super(
      'VALUE_OUT_OF_RANGE',
      `Value ${value.toString()} does not fit an attribute set of length ${String(length)}.`,
    );
    this.value = value;
    this.length = length;
  }
}

/** Two attribute sets (or dependencies) over different universes were combined. */
export class LengthMismatchError extends FdNormalizerError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      'LENGTH_MISMATCH',
      `Attribute set length mismatch: expected ${String(expected)}, got ${String(actual)}.`,
    );
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidLengthError extends FdNormalizerError {
  constructor(length: number) {
    super('INVALID_LENGTH', `Attribute count must be a non-negative integer, got ${String(length)}.`);
  }
}

export class DuplicateAttributeError extends FdNormalizerError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('DUPLICATE_ATTRIBUTE', `Attribute "${attribute}" is declared more than once.`);
    this.attribute = attribute;
  }
}

export class UnknownAttributeError extends FdNormalizerError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('UNKNOWN_ATTRIBUTE', `Attribute "${attribute}" is not part of the relation.`);
    this.attribute = attribute;
  }
}

/** The random generator could not produce the requested number of distinct dependencies. */
export class GenerationLimitError extends FdNormalizerError {
  constructor(requested: number, produced: number) {
    super(
      'GENERATION_LIMIT',
      `Could only generate ${String(produced)} of ${String(requested)} distinct functional dependencies.`,
    );
  }
}
