/**
 * Error types raised by the obfuscators.
 *
 * Nothing in the library catches or logs these; they always surface to the
 * immediate caller. Errors thrown by a destination or input stream are not
 * wrapped and propagate as-is.
 */

export class ObfuscationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A required name, value or destination was `null` or `undefined`. */
export class NullArgumentError extends ObfuscationError {}

/** Two registry entries share a name under the same case sensitivity. */
export class DuplicateKeyError extends ObfuscationError {}

/** Invalid builder input, such as a negative limit or a bad config file. */
export class IllegalConfigurationError extends ObfuscationError {}

/** Malformed percent-encoding. */
export class DecodingError extends ObfuscationError {}

/** Unsupported character encoding, or text it cannot represent. */
export class EncodingError extends ObfuscationError {}

/** Invalid `[start, end)` span or `(offset, length)` sub-range. */
export class IndexOutOfRangeError extends ObfuscationError {}

/** Write to a streaming writer that was already closed. */
export class StreamClosedError extends ObfuscationError {}

export function requireNonNull<T>(value: T | null | undefined, name: string): T {
  if (value === null || value === undefined) {
    throw new NullArgumentError(`${name} must not be null or undefined`);
  }
  return value;
}

export function checkStartAndEnd(s: string, start: number, end: number): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    start > end ||
    end > s.length
  ) {
    throw new IndexOutOfRangeError(
      `start: ${start}, end: ${end}, length: ${s.length}`,
    );
  }
}

export function checkOffsetAndLength(
  arrayLength: number,
  offset: number,
  length: number,
): void {
  if (
    !Number.isInteger(offset) ||
    !Number.isInteger(length) ||
    offset < 0 ||
    length < 0 ||
    offset + length > arrayLength
  ) {
    throw new IndexOutOfRangeError(
      `offset: ${offset}, length: ${length}, array length: ${arrayLength}`,
    );
  }
}
