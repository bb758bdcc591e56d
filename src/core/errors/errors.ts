/**
 * Error classes thrown by the serializers.
 *
 * Every error is raised synchronously at the point of detection.
 * A buffer produced by an encode call that threw must be discarded.
 */

export class WirepackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WirepackError";
  }
}

/**
 * Value count or shape does not match the declared schema,
 * or a decoded layout does not line up with it.
 */
export class SchemaMismatchError extends WirepackError {
  constructor(message: string, public readonly path: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "SchemaMismatchError";
  }
}

/**
 * Value exceeds a type's representable range or length-prefix capacity.
 */
export class EncodingOverflowError extends WirepackError {
  constructor(message: string, public readonly path: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "EncodingOverflowError";
  }
}

/**
 * Value length differs from a fixed-length type's declared length.
 */
export class FixedLengthViolationError extends WirepackError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    public readonly path: string
  ) {
    super(`${path ? `${path}: ` : ""}expected exactly ${expected} elements, got ${actual}`);
    this.name = "FixedLengthViolationError";
  }
}

export class BufferTruncatedError extends WirepackError {
  constructor(public readonly needed: number, public readonly available: number) {
    super(`Buffer truncated: needed ${needed} bytes, ${available} available`);
    this.name = "BufferTruncatedError";
  }
}

/**
 * Dynamic decode met a tag outside the known tag space.
 * Signals corrupt or version-mismatched input.
 */
export class InvalidTypeTagError extends WirepackError {
  constructor(public readonly tag: number) {
    super(`Invalid type tag: ${tag}`);
    this.name = "InvalidTypeTagError";
  }
}

export class InvalidCompressionLevelError extends WirepackError {
  constructor(public readonly level: number, min: number, max: number) {
    super(`Invalid compression level ${level}, expected an integer in [${min}, ${max}]`);
    this.name = "InvalidCompressionLevelError";
  }
}

export class CompressionFailureError extends WirepackError {
  constructor(message: string) {
    super(`Compression failure: ${message}`);
    this.name = "CompressionFailureError";
  }
}
