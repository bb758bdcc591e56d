/**
 * Serializers
 *
 * - {@link Serializer}: schema-compiled, no per-value type metadata
 * - {@link DynamicSerializer}: self-describing, one type tag per value
 *
 * Both accept the same {@link SerializerConfig} and share the wire envelope
 * `[reserved offset][payload]`, where the payload may be compressed.
 */

export type { SerializerConfig } from "./base-serializer";
export { checkOffset } from "./base-serializer";
export { Serializer, compile } from "./serializer";
export { DynamicSerializer } from "./dynamic-serializer";
