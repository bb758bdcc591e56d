import { describe, it, expect } from "vitest";
import { CompressionFailureError, InvalidCompressionLevelError } from "../errors";
import {
  CompressionAdapter,
  DeflateCompressor,
  isCompressionLevel,
  validateCompressionLevel,
} from "./compression";
import type { Compressor } from "./compression";

const text = new TextEncoder().encode("abcabcabcabcabcabcabcabcabcabcabcabc");

describe("compression levels", () => {
  it("should accept integers from 0 to 9", () => {
    for (let level = 0; level <= 9; level++) {
      expect(isCompressionLevel(level)).toBe(true);
    }
  });

  it.each([-1, 10, 2.5, NaN])("should reject %d", (level) => {
    expect(() => validateCompressionLevel(level)).toThrow(InvalidCompressionLevelError);
  });

  it("should report the accepted range", () => {
    expect(() => new CompressionAdapter(10)).toThrow(
      "Invalid compression level 10, expected an integer in [0, 9]"
    );
  });
});

describe("DeflateCompressor", () => {
  const compressor = new DeflateCompressor();

  it("should shrink repetitive data", () => {
    const compressed = compressor.compress(text, 9);
    expect(compressed.length).toBeLessThan(text.length);
    expect(compressor.decompress(compressed)).toEqual(text);
  });

  it("should fail on a stream that ends early", () => {
    const stored = compressor.compress(text, 0);
    expect(() => compressor.decompress(stored.subarray(0, 10))).toThrow(CompressionFailureError);
  });
});

describe("CompressionAdapter", () => {
  it("should prefix the payload with its level", () => {
    const wrapped = new CompressionAdapter(6).wrap(text);
    expect(wrapped[0]).toBe(6);
    expect(new CompressionAdapter(6).unwrap(wrapped)).toEqual(text);
  });

  it("should round-trip at every level", () => {
    for (let level = 0; level <= 9; level++) {
      const adapter = new CompressionAdapter(level);
      expect(adapter.unwrap(adapter.wrap(text))).toEqual(text);
    }
  });

  it("should refuse payloads written at another level", () => {
    const wrapped = new CompressionAdapter(1).wrap(text);
    expect(() => new CompressionAdapter(9).unwrap(wrapped)).toThrow(
      new CompressionFailureError("payload was compressed at level 1, expected 9")
    );
  });

  it("should refuse an empty payload", () => {
    expect(() => new CompressionAdapter(3).unwrap(new Uint8Array(0))).toThrow(
      "Compression failure: missing compression header"
    );
  });

  it("should report corrupt data as a compression failure", () => {
    const corrupt = new Uint8Array([3, 0xff, 0xff, 0xff]);
    expect(() => new CompressionAdapter(3).unwrap(corrupt)).toThrow(CompressionFailureError);
  });

  it("should use a custom compressor", () => {
    const reversing: Compressor = {
      compress: (data) => data.slice().reverse(),
      decompress: (data) => data.slice().reverse(),
    };
    const adapter = new CompressionAdapter(2, reversing);

    expect(Array.from(adapter.wrap(new Uint8Array([1, 2, 3])))).toEqual([2, 3, 2, 1]);
    expect(Array.from(adapter.unwrap(new Uint8Array([2, 3, 2, 1])))).toEqual([1, 2, 3]);
  });

  it("should wrap errors thrown by a custom compressor", () => {
    const failing: Compressor = {
      compress: () => {
        throw new Error("boom");
      },
      decompress: (data) => data,
    };
    expect(() => new CompressionAdapter(1, failing).wrap(text)).toThrow(
      new CompressionFailureError("boom")
    );
  });
});
