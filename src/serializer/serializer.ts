import { ByteReader, ByteWriter } from "../core/buffer-codec";
import { SchemaMismatchError } from "../core/errors";
import { fixedSizeOf, measureNode, readNode, writeNode } from "../core/node-codec";
import type { InferValues, Type } from "../core/types";
import { BaseSerializer, checkOffset } from "./base-serializer";
import type { SerializerConfig } from "./base-serializer";

/**
 * A compiled schema: encodes and decodes value tuples with no type tags
 * on the wire. The byte layout is the concatenation of each schema
 * entry's encoding, in schema order.
 *
 * @example
 * ```ts
 * const serializer = new Serializer([
 *   Types.Int32,
 *   Types.String,
 *   Types.Struct({ Hello: Types.String, World: Types.Int32 }),
 * ]);
 *
 * const buf = serializer.serialize([42, "Hello, world!", { Hello: "hi", World: 999 }]);
 * const [n, text, pair] = serializer.deserialize(buf);
 * ```
 */
export class Serializer<S extends readonly Type<unknown>[]> extends BaseSerializer {
  readonly schema: readonly Type<unknown>[];

  /**
   * Payload size when every schema entry is fixed-size, else undefined.
   */
  readonly fixedSize: number | undefined;

  constructor(schema: readonly [...S], config: SerializerConfig = {}) {
    super("Serializer", config);
    this.schema = Object.freeze([...schema]);
    this.fixedSize = Serializer.sumFixed(schema);
  }

  private static sumFixed(schema: readonly Type<unknown>[]): number | undefined {
    let size = 0;
    for (const node of schema) {
      const nodeSize = fixedSizeOf(node);
      if (nodeSize === undefined) return undefined;
      size += nodeSize;
    }
    return size;
  }

  /**
   * Validates values against the schema and returns the uncompressed
   * payload size in bytes.
   */
  measure(values: InferValues<S>): number {
    const list: readonly unknown[] = values;
    if (list.length !== this.schema.length) {
      throw new SchemaMismatchError(
        `expected ${this.schema.length} values, got ${list.length}`,
        ""
      );
    }

    let size = 0;
    this.schema.forEach((node, i) => {
      size += measureNode(node, list[i], `[${i}]`);
    });
    return size;
  }

  /**
   * Encodes values into a new buffer.
   *
   * @param values Value tuple matching the schema
   * @param offset Leading bytes to reserve (left zeroed)
   * @returns `offset` reserved bytes followed by the payload
   */
  serialize(values: InferValues<S>, offset = 0): Uint8Array {
    checkOffset(offset);
    const size = this.measure(values);

    let out: Uint8Array;
    if (this.compression) {
      const writer = new ByteWriter(size);
      this.writeValues(values, writer);
      out = this.assemble(writer.finish(), offset);
    } else {
      out = new Uint8Array(offset + size);
      this.writeValues(values, ByteWriter.over(out, offset));
    }

    this.log(`serialized ${this.schema.length} values: ${size} byte payload, ${out.length} bytes total`);
    return out;
  }

  /**
   * Encodes values into `target` starting at `offset`.
   * Bytes before `offset` are left exactly as they were.
   *
   * @returns Number of bytes written after `offset`
   */
  serializeInto(values: InferValues<S>, target: Uint8Array, offset = 0): number {
    checkOffset(offset);
    const size = this.measure(values);

    if (this.compression) {
      const writer = new ByteWriter(size);
      this.writeValues(values, writer);
      const body = this.compression.wrap(writer.finish());
      this.ensureCapacity(target, offset, body.length);
      target.set(body, offset);
      this.log(`serialized ${this.schema.length} values into target: ${body.length} bytes`);
      return body.length;
    }

    this.ensureCapacity(target, offset, size);
    this.writeValues(values, ByteWriter.over(target, offset));
    this.log(`serialized ${this.schema.length} values into target: ${size} bytes`);
    return size;
  }

  /**
   * Decodes a buffer produced by {@link serialize} with the same schema,
   * compression level and offset.
   */
  deserialize(buffer: Uint8Array, offset = 0): InferValues<S> {
    const { bytes, start } = this.openPayload(buffer, offset);
    const reader = new ByteReader(bytes, start);

    const values = this.schema.map((node, i) => readNode(node, reader, this.context, `[${i}]`));

    if (reader.remaining > 0) {
      throw new SchemaMismatchError(`${reader.remaining} trailing bytes after the last value`, "");
    }

    this.log(`deserialized ${values.length} values from ${buffer.length} bytes`);
    return values as InferValues<S>;
  }

  private writeValues(values: InferValues<S>, writer: ByteWriter): void {
    const list: readonly unknown[] = values;
    this.schema.forEach((node, i) => writeNode(node, list[i], writer, `[${i}]`));
  }

  private ensureCapacity(target: Uint8Array, offset: number, size: number): void {
    if (target.length < offset + size) {
      throw new RangeError(
        `Target buffer too small: need ${offset + size} bytes, got ${target.length}`
      );
    }
  }
}

/**
 * Compiles a schema into a reusable {@link Serializer}.
 */
export function compile<S extends readonly Type<unknown>[]>(
  schema: readonly [...S],
  config?: SerializerConfig
): Serializer<S> {
  return new Serializer(schema, config);
}
