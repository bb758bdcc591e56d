import { ByteReader, ByteWriter } from "../core/buffer-codec";
import { measureDynamic, readDynamic, writeDynamic } from "../core/dynamic-codec";
import type { DynamicValue } from "../core/dynamic-codec";
import { BaseSerializer, checkOffset } from "./base-serializer";
import type { SerializerConfig } from "./base-serializer";

/** Starting capacity for dynamic payloads; the writer grows as needed */
const INITIAL_CAPACITY = 64;

/**
 * Self-describing serializer: no schema, a one-byte type tag before
 * every value. See `TypeTag` for the tag table and `classify` for the
 * inference order.
 *
 * The compression level may be chosen per call; it overrides
 * `config.compressionLevel`, and decode must use the level encode used.
 *
 * @example
 * ```ts
 * const dynamic = new DynamicSerializer();
 * const buf = dynamic.serialize([42, "x", true]);
 * dynamic.deserialize(buf); // [42, "x", true]
 *
 * const packed = dynamic.serialize([42, "x", true], 0, 9);
 * dynamic.deserialize(packed, 0, 9);
 * ```
 */
export class DynamicSerializer extends BaseSerializer {
  constructor(config: SerializerConfig = {}) {
    super("DynamicSerializer", config);
  }

  /**
   * Encoded payload size of the values, tags included, before compression.
   */
  measure(values: readonly DynamicValue[]): number {
    let size = 0;
    for (let i = 0; i < values.length; i++) {
      size += measureDynamic(values[i], `[${i}]`);
    }
    return size;
  }

  /**
   * Encodes values into a new buffer.
   *
   * @param values Values to encode, in order; holes encode as `undefined`
   * @param offset Leading bytes to reserve (left zeroed)
   * @param compressionLevel DEFLATE level for this call only
   */
  serialize(values: readonly DynamicValue[], offset = 0, compressionLevel?: number): Uint8Array {
    checkOffset(offset);
    const compression = this.compressionFor(compressionLevel);

    let out: Uint8Array;
    if (compression) {
      const writer = new ByteWriter(INITIAL_CAPACITY);
      this.writeValues(values, writer);
      out = this.assemble(writer.finish(), offset, compression);
    } else {
      const writer = new ByteWriter(offset + INITIAL_CAPACITY);
      writer.writeZeros(offset);
      this.writeValues(values, writer);
      out = writer.finish();
    }

    this.log(`serialized ${values.length} values into ${out.length} bytes`);
    return out;
  }

  /**
   * Decodes every tagged value between `offset` and the end of the payload.
   *
   * @param compressionLevel Level the payload was encoded with, if it differs from the configured one
   */
  deserialize(buffer: Uint8Array, offset = 0, compressionLevel?: number): DynamicValue[] {
    const compression = this.compressionFor(compressionLevel);
    const { bytes, start } = this.openPayload(buffer, offset, compression);
    const reader = new ByteReader(bytes, start);

    const values: DynamicValue[] = [];
    while (reader.remaining > 0) {
      values.push(readDynamic(reader, this.context, `[${values.length}]`));
    }

    this.log(`deserialized ${values.length} values from ${buffer.length} bytes`);
    return values;
  }

  private writeValues(values: readonly DynamicValue[], writer: ByteWriter): void {
    for (let i = 0; i < values.length; i++) {
      writeDynamic(values[i], writer, `[${i}]`);
    }
  }
}
