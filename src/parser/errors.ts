/**
 * Error types raised while decoding NBT data or reading container dumps.
 *
 * Every error carries a stable `code` so callers can branch on the failure
 * kind, and the byte offset (or record index) where it was detected when one
 * is known.
 */

export type NbtErrorCode =
  | 'TruncatedInput'
  | 'UnknownTag'
  | 'NegativeLength'
  | 'TypeMismatch'
  | 'IndexOutOfRange'
  | 'InvalidInput';

export class NbtError extends Error {
  readonly code: NbtErrorCode;
  readonly offset?: number;

  constructor(code: NbtErrorCode, message: string, offset?: number) {
    super(offset !== undefined ? `${message} at position ${offset}` : message);
    this.name = `${code}Error`;
    this.code = code;
    this.offset = offset;
  }
}

export class TruncatedInputError extends NbtError {
  constructor(needed: number, remaining: number, offset: number) {
    super('TruncatedInput', `Unexpected end of input: needed ${needed} byte(s), ${remaining} left`, offset);
  }
}

export class UnknownTagError extends NbtError {
  readonly tag: number;

  constructor(tag: number, offset: number) {
    super('UnknownTag', `Unknown tag type: ${tag}`, offset);
    this.tag = tag;
  }
}

export class NegativeLengthError extends NbtError {
  readonly length: number;

  constructor(length: number, offset: number) {
    super('NegativeLength', `Negative length: ${length}`, offset);
    this.length = length;
  }
}

export class TypeMismatchError extends NbtError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string, offset?: number) {
    super('TypeMismatch', `Expected ${expected} tag but found ${actual}`, offset);
    this.expected = expected;
    this.actual = actual;
  }
}

export class IndexOutOfRangeError extends NbtError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super('IndexOutOfRange', `Index ${index} out of range for length ${length}`);
    this.index = index;
    this.length = length;
  }
}

export class InvalidInputError extends NbtError {
  constructor(message: string, offset?: number) {
    super('InvalidInput', message, offset);
  }
}

export function isNbtError(error: unknown): error is NbtError {
  return error instanceof NbtError;
}
