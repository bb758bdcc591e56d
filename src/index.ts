/**
 * wirepack
 *
 * Binary serialization for low-latency game state sync:
 * - Schema-compiled serializers with no per-value type overhead
 * - Self-describing dynamic serializers with one-byte type tags
 * - Reduced-precision Float24, bit-packed booleans, fixed and
 *   length-prefixed strings, arrays, maps, structs and optionals
 * - Optional DEFLATE compression of the payload region
 * - A reserved leading region callers can fill with their own header
 */

// Core codecs, type definitions and value kinds
export * from "./core";

// Static and dynamic serializers
export * from "./serializer";
