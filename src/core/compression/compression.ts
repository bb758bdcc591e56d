import { deflateRaw, inflateRaw } from "pako";
import { CompressionFailureError, InvalidCompressionLevelError, WirepackError } from "../errors";

export const MIN_COMPRESSION_LEVEL = 0;
export const MAX_COMPRESSION_LEVEL = 9;

/** DEFLATE levels: 0 stores, 9 compresses hardest */
export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export function isCompressionLevel(level: number): level is CompressionLevel {
  return Number.isInteger(level) && level >= MIN_COMPRESSION_LEVEL && level <= MAX_COMPRESSION_LEVEL;
}

export function validateCompressionLevel(level: number): CompressionLevel {
  if (!isCompressionLevel(level)) {
    throw new InvalidCompressionLevelError(level, MIN_COMPRESSION_LEVEL, MAX_COMPRESSION_LEVEL);
  }
  return level;
}

/**
 * Pluggable byte transform applied to the payload region.
 * Implementations may throw on corrupt input; the adapter reports
 * that as a CompressionFailureError.
 */
export interface Compressor {
  compress(data: Uint8Array, level: CompressionLevel): Uint8Array;
  decompress(data: Uint8Array): Uint8Array;
}

/**
 * Raw DEFLATE (no zlib header) via pako.
 */
export class DeflateCompressor implements Compressor {
  compress(data: Uint8Array, level: CompressionLevel): Uint8Array {
    return deflateRaw(data, { level });
  }

  decompress(data: Uint8Array): Uint8Array {
    const result: unknown = inflateRaw(data);
    // pako returns nothing for a stream that ends early
    if (!(result instanceof Uint8Array)) {
      throw new CompressionFailureError("incomplete deflate stream");
    }
    return result;
  }
}

function failureMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Wraps payloads as `[level: u8][compressed bytes]` and unwraps them.
 *
 * The leading level byte lets a decoder configured with a different
 * level fail instead of misreading the payload.
 */
export class CompressionAdapter {
  readonly level: CompressionLevel;

  constructor(level: number, private readonly compressor: Compressor = new DeflateCompressor()) {
    this.level = validateCompressionLevel(level);
  }

  wrap(payload: Uint8Array): Uint8Array {
    let compressed: Uint8Array;
    try {
      compressed = this.compressor.compress(payload, this.level);
    } catch (error) {
      if (error instanceof WirepackError) throw error;
      throw new CompressionFailureError(failureMessage(error));
    }

    const out = new Uint8Array(1 + compressed.length);
    out[0] = this.level;
    out.set(compressed, 1);
    return out;
  }

  unwrap(bytes: Uint8Array): Uint8Array {
    if (bytes.length === 0) {
      throw new CompressionFailureError("missing compression header");
    }
    if (bytes[0] !== this.level) {
      throw new CompressionFailureError(
        `payload was compressed at level ${bytes[0]}, expected ${this.level}`
      );
    }

    try {
      return this.compressor.decompress(bytes.subarray(1));
    } catch (error) {
      if (error instanceof WirepackError) throw error;
      throw new CompressionFailureError(failureMessage(error));
    }
  }
}
