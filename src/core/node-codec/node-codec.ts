import { ByteReader, ByteWriter, Primitives, utf8Encode, utf8Decode, utf8Length } from "../buffer-codec";
import type { Field } from "../buffer-codec";
import {
  describeValue,
  expectBoolean,
  expectFloat,
  expectInstance,
  expectInteger,
  expectString,
  expectTransformComponents,
  expectVectorComponents,
  isRecord,
} from "../checks";
import { measureDynamic, readDynamic, writeDynamic } from "../dynamic-codec";
import type { DynamicContext } from "../dynamic-codec";
import {
  BufferTruncatedError,
  EncodingOverflowError,
  FixedLengthViolationError,
  SchemaMismatchError,
} from "../errors";
import type {
  BitsWidth,
  IntWidth,
  LengthMode,
  TransformPrecision,
  TypeNode,
  VectorPrecision,
} from "../types";
import { Color3, EnumItem, Transform, Vector2, Vector3 } from "../values";
import type { EnumDomain } from "../values";

/**
 * Decoding context. Only `Any` nodes consult it.
 */
export type CodecContext = DynamicContext;

export const EMPTY_CONTEXT: CodecContext = { enums: new Map() };

function intField(width: IntWidth, signed: boolean): Field<number> {
  switch (width) {
    case 8:
      return signed ? Primitives.i8 : Primitives.u8;
    case 16:
      return signed ? Primitives.i16 : Primitives.u16;
    case 32:
      return signed ? Primitives.i32 : Primitives.u32;
  }
}

function bitsField(width: BitsWidth): Field<number> {
  return intField(width, false);
}

function vector2Field(precision: VectorPrecision): Field<Vector2> {
  switch (precision) {
    case "float32":
      return Primitives.vec2;
    case "float24":
      return Primitives.vec2f24;
    case "int16":
      return Primitives.vec2i16;
  }
}

function vector3Field(precision: VectorPrecision): Field<Vector3> {
  switch (precision) {
    case "float32":
      return Primitives.vec3;
    case "float24":
      return Primitives.vec3f24;
    case "int16":
      return Primitives.vec3i16;
  }
}

function transformField(precision: TransformPrecision): Field<Transform> {
  return precision === "float32" ? Primitives.transform : Primitives.transformf24;
}

function prefixField(mode: LengthMode): Field<number> | undefined {
  if (mode.mode === "fixed") return undefined;
  return mode.prefix === 1 ? Primitives.u8 : Primitives.u16;
}

/**
 * Byte size of a node whose encoding does not depend on the value,
 * or `undefined` for variable-size nodes.
 */
export function fixedSizeOf(node: TypeNode): number | undefined {
  switch (node.kind) {
    case "int":
      return node.width / 8;
    case "float":
      return node.width / 8;
    case "float24":
      return 3;
    case "bool":
    case "boolPacked":
      return 1;
    case "stringFixed":
      return node.length;
    case "void":
    case "nil":
      return 0;
    case "vector2":
      return vector2Field(node.precision).size;
    case "vector3":
      return vector3Field(node.precision).size;
    case "transform":
      return transformField(node.precision).size;
    case "color3":
      return Primitives.color3.size;
    case "enum":
      return 2;
    case "bits":
      return (node.count * node.width) / 8;
    case "array": {
      if (node.length.mode !== "fixed") return undefined;
      const element = fixedSizeOf(node.element);
      return element === undefined ? undefined : element * node.length.count;
    }
    case "map": {
      if (node.length.mode !== "fixed") return undefined;
      const key = fixedSizeOf(node.key);
      const value = fixedSizeOf(node.value);
      if (key === undefined || value === undefined) return undefined;
      return (key + value) * node.length.count;
    }
    case "struct": {
      let size = 0;
      for (const field of node.fields) {
        const fieldSize = fixedSizeOf(field.type);
        if (fieldSize === undefined) return undefined;
        size += fieldSize;
      }
      return size;
    }
    case "string":
    case "stringNull":
    case "any":
    case "optional":
      return undefined;
  }
}

/**
 * Checks a collection's element count against its length mode.
 */
function checkLength(mode: LengthMode, count: number, path: string): void {
  if (mode.mode === "fixed") {
    if (count !== mode.count) {
      throw new FixedLengthViolationError(mode.count, count, path);
    }
    return;
  }
  const max = mode.prefix === 1 ? 0xff : 0xffff;
  if (count > max) {
    throw new EncodingOverflowError(`${count} elements exceed ${max}`, path);
  }
}

function expectArray(value: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    throw new SchemaMismatchError(`expected array, got ${describeValue(value)}`, path);
  }
  return value;
}

function expectMap(value: unknown, path: string): ReadonlyMap<unknown, unknown> {
  if (!(value instanceof Map)) {
    throw new SchemaMismatchError(`expected Map, got ${describeValue(value)}`, path);
  }
  return value;
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new SchemaMismatchError(`expected struct object, got ${describeValue(value)}`, path);
  }
  return value;
}

function expectEnumItem(node: { readonly domain: EnumDomain }, value: unknown, path: string): EnumItem {
  const item = expectInstance(value, EnumItem, path);
  if (!node.domain.has(item)) {
    throw new SchemaMismatchError(
      `expected an item of enum "${node.domain.name}", got ${item.toString()}`,
      path
    );
  }
  return item;
}

function expectVector2(precision: VectorPrecision, value: unknown, path: string): Vector2 {
  const v = expectInstance(value, Vector2, path);
  expectVectorComponents(precision, v, path);
  return v;
}

function expectVector3(precision: VectorPrecision, value: unknown, path: string): Vector3 {
  const v = expectInstance(value, Vector3, path);
  expectVectorComponents(precision, v, path);
  return v;
}

function expectTransform(precision: TransformPrecision, value: unknown, path: string): Transform {
  const t = expectInstance(value, Transform, path);
  expectTransformComponents(precision, t, path);
  return t;
}

function expectColor(value: unknown, path: string): Color3 {
  const color = expectInstance(value, Color3, path);
  expectInteger(color.r, 8, false, `${path}.r`);
  expectInteger(color.g, 8, false, `${path}.g`);
  expectInteger(color.b, 8, false, `${path}.b`);
  return color;
}

function expectPackedBools(value: unknown, path: string): readonly unknown[] {
  const bools = expectArray(value, path);
  if (bools.length !== 8) {
    throw new FixedLengthViolationError(8, bools.length, path);
  }
  for (let i = 0; i < bools.length; i++) expectBoolean(bools[i], `${path}[${i}]`);
  return bools;
}

function expectBits(width: BitsWidth, count: number, value: unknown, path: string): readonly unknown[] {
  const values = expectArray(value, path);
  if (values.length !== count) {
    throw new FixedLengthViolationError(count, values.length, path);
  }
  for (let i = 0; i < values.length; i++) expectInteger(values[i], width, false, `${path}[${i}]`);
  return values;
}

function expectNullTerminatable(value: unknown, path: string): string {
  const s = expectString(value, path);
  if (s.includes("\0")) {
    throw new EncodingOverflowError("null-terminated string contains a zero byte", path);
  }
  return s;
}

function prefixedStringLength(prefix: 1 | 2, value: unknown, path: string): number {
  const length = utf8Length(expectString(value, path));
  const max = prefix === 1 ? 0xff : 0xffff;
  if (length > max) {
    throw new EncodingOverflowError(`string of ${length} bytes exceeds ${max}`, path);
  }
  return length;
}

/**
 * Validates a value against a node and returns its encoded size.
 * Recurses depth-first through composites.
 */
export function measureNode(node: TypeNode, value: unknown, path: string): number {
  switch (node.kind) {
    case "int":
      expectInteger(value, node.width, node.signed, path);
      return node.width / 8;
    case "float":
      expectFloat(value, node.width === 32 ? "float32" : "float64", path);
      return node.width / 8;
    case "float24":
      expectFloat(value, "float24", path);
      return 3;
    case "bool":
      expectBoolean(value, path);
      return 1;
    case "string":
      return node.prefix + prefixedStringLength(node.prefix, value, path);
    case "stringFixed":
      expectString(value, path);
      return node.length;
    case "stringNull":
      return utf8Length(expectNullTerminatable(value, path)) + 1;
    case "void":
      if (value !== undefined) {
        throw new SchemaMismatchError(`expected undefined, got ${describeValue(value)}`, path);
      }
      return 0;
    case "nil":
      if (value !== null) {
        throw new SchemaMismatchError(`expected null, got ${describeValue(value)}`, path);
      }
      return 0;
    case "any":
      return measureDynamic(value, path);
    case "vector2":
      expectVector2(node.precision, value, path);
      return vector2Field(node.precision).size;
    case "vector3":
      expectVector3(node.precision, value, path);
      return vector3Field(node.precision).size;
    case "transform":
      expectTransform(node.precision, value, path);
      return transformField(node.precision).size;
    case "color3":
      expectColor(value, path);
      return Primitives.color3.size;
    case "enum":
      expectEnumItem(node, value, path);
      return 2;
    case "array": {
      const items = expectArray(value, path);
      checkLength(node.length, items.length, path);
      let size = prefixField(node.length)?.size ?? 0;
      // Holes count as undefined, so the count prefix always matches
      for (let i = 0; i < items.length; i++) {
        size += measureNode(node.element, items[i], `${path}[${i}]`);
      }
      return size;
    }
    case "map": {
      const entries = expectMap(value, path);
      checkLength(node.length, entries.size, path);
      let size = prefixField(node.length)?.size ?? 0;
      let i = 0;
      for (const [k, v] of entries) {
        size += measureNode(node.key, k, `${path}[key ${i}]`);
        size += measureNode(node.value, v, `${path}[value ${i}]`);
        i++;
      }
      return size;
    }
    case "struct": {
      const record = expectRecord(value, path);
      let size = 0;
      for (const field of node.fields) {
        size += measureNode(field.type, record[field.name], `${path}.${field.name}`);
      }
      return size;
    }
    case "optional":
      return value === undefined ? 1 : 1 + measureNode(node.inner, value, path);
    case "boolPacked":
      expectPackedBools(value, path);
      return 1;
    case "bits":
      expectBits(node.width, node.count, value, path);
      return (node.count * node.width) / 8;
  }
}

function writeFixedString(length: number, value: string, writer: ByteWriter): void {
  const bytes = utf8Encode(value);
  let end = Math.min(bytes.length, length);
  // Back off so a multi-byte character is never split
  while (end > 0 && end < bytes.length && (bytes[end] & 0xc0) === 0x80) end--;
  writer.writeBytes(bytes.subarray(0, end));
  writer.writeZeros(length - end);
}

/**
 * Writes a value that {@link measureNode} has accepted.
 */
export function writeNode(node: TypeNode, value: unknown, writer: ByteWriter, path: string): void {
  switch (node.kind) {
    case "int":
      writer.write(intField(node.width, node.signed), expectInteger(value, node.width, node.signed, path));
      return;
    case "float":
      writer.write(
        node.width === 32 ? Primitives.f32 : Primitives.f64,
        expectFloat(value, node.width === 32 ? "float32" : "float64", path)
      );
      return;
    case "float24":
      writer.write(Primitives.f24, expectFloat(value, "float24", path));
      return;
    case "bool":
      writer.write(Primitives.bool, expectBoolean(value, path));
      return;
    case "string":
      prefixedStringLength(node.prefix, value, path);
      writer.writeString(expectString(value, path), node.prefix);
      return;
    case "stringFixed":
      writeFixedString(node.length, expectString(value, path), writer);
      return;
    case "stringNull":
      writer.writeBytes(utf8Encode(expectNullTerminatable(value, path)));
      writer.write(Primitives.u8, 0);
      return;
    case "void":
    case "nil":
      return;
    case "any":
      writeDynamic(value, writer, path);
      return;
    case "vector2":
      writer.write(vector2Field(node.precision), expectVector2(node.precision, value, path));
      return;
    case "vector3":
      writer.write(vector3Field(node.precision), expectVector3(node.precision, value, path));
      return;
    case "transform":
      writer.write(transformField(node.precision), expectTransform(node.precision, value, path));
      return;
    case "color3":
      writer.write(Primitives.color3, expectColor(value, path));
      return;
    case "enum":
      writer.write(Primitives.u16, expectEnumItem(node, value, path).index);
      return;
    case "array": {
      const items = expectArray(value, path);
      checkLength(node.length, items.length, path);
      const prefix = prefixField(node.length);
      if (prefix) writer.write(prefix, items.length);
      for (let i = 0; i < items.length; i++) {
        writeNode(node.element, items[i], writer, `${path}[${i}]`);
      }
      return;
    }
    case "map": {
      const entries = expectMap(value, path);
      checkLength(node.length, entries.size, path);
      const prefix = prefixField(node.length);
      if (prefix) writer.write(prefix, entries.size);
      let i = 0;
      for (const [k, v] of entries) {
        writeNode(node.key, k, writer, `${path}[key ${i}]`);
        writeNode(node.value, v, writer, `${path}[value ${i}]`);
        i++;
      }
      return;
    }
    case "struct": {
      const record = expectRecord(value, path);
      for (const field of node.fields) {
        writeNode(field.type, record[field.name], writer, `${path}.${field.name}`);
      }
      return;
    }
    case "optional":
      if (value === undefined) {
        writer.write(Primitives.u8, 0);
        return;
      }
      writer.write(Primitives.u8, 1);
      writeNode(node.inner, value, writer, path);
      return;
    case "boolPacked": {
      const bools = expectPackedBools(value, path);
      let byte = 0;
      for (let i = 0; i < bools.length; i++) {
        if (bools[i] === true) byte |= 1 << i;
      }
      writer.write(Primitives.u8, byte);
      return;
    }
    case "bits": {
      const field = bitsField(node.width);
      const values = expectBits(node.width, node.count, value, path);
      for (let i = 0; i < values.length; i++) {
        writer.write(field, expectInteger(values[i], node.width, false, `${path}[${i}]`));
      }
      return;
    }
  }
}

function readCount(mode: LengthMode, reader: ByteReader): number {
  const prefix = prefixField(mode);
  if (prefix) return reader.read(prefix);
  return mode.mode === "fixed" ? mode.count : 0;
}

/**
 * Reads one value laid out by `node`, advancing the reader by exactly
 * the bytes the node consumes.
 */
export function readNode(node: TypeNode, reader: ByteReader, context: CodecContext, path: string): unknown {
  switch (node.kind) {
    case "int":
      return reader.read(intField(node.width, node.signed));
    case "float":
      return reader.read(node.width === 32 ? Primitives.f32 : Primitives.f64);
    case "float24":
      return reader.read(Primitives.f24);
    case "bool":
      return reader.read(Primitives.bool);
    case "string":
      return reader.readString(node.prefix);
    case "stringFixed": {
      const bytes = reader.readBytes(node.length);
      let end = bytes.length;
      while (end > 0 && bytes[end - 1] === 0) end--;
      return utf8Decode(bytes.subarray(0, end));
    }
    case "stringNull": {
      const terminator = reader.indexOf(0);
      if (terminator === -1) {
        throw new BufferTruncatedError(reader.remaining + 1, reader.remaining);
      }
      const text = utf8Decode(reader.readBytes(terminator - reader.offset));
      reader.readBytes(1);
      return text;
    }
    case "void":
      return undefined;
    case "nil":
      return null;
    case "any":
      return readDynamic(reader, context, path);
    case "vector2":
      return reader.read(vector2Field(node.precision));
    case "vector3":
      return reader.read(vector3Field(node.precision));
    case "transform":
      return reader.read(transformField(node.precision));
    case "color3":
      return reader.read(Primitives.color3);
    case "enum": {
      const index = reader.read(Primitives.u16);
      const item = node.domain.at(index);
      if (!item) {
        throw new SchemaMismatchError(
          `index ${index} out of range for enum "${node.domain.name}"`,
          path
        );
      }
      return item;
    }
    case "array": {
      const count = readCount(node.length, reader);
      const items: unknown[] = [];
      for (let i = 0; i < count; i++) {
        items.push(readNode(node.element, reader, context, `${path}[${i}]`));
      }
      return items;
    }
    case "map": {
      const count = readCount(node.length, reader);
      const entries = new Map<unknown, unknown>();
      for (let i = 0; i < count; i++) {
        const key = readNode(node.key, reader, context, `${path}[key ${i}]`);
        entries.set(key, readNode(node.value, reader, context, `${path}[value ${i}]`));
      }
      return entries;
    }
    case "struct": {
      const record: Record<string, unknown> = {};
      for (const field of node.fields) {
        Object.defineProperty(record, field.name, {
          value: readNode(field.type, reader, context, `${path}.${field.name}`),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return record;
    }
    case "optional": {
      const flag = reader.read(Primitives.u8);
      if (flag === 0) return undefined;
      if (flag !== 1) {
        throw new SchemaMismatchError(`invalid presence flag ${flag}`, path);
      }
      return readNode(node.inner, reader, context, path);
    }
    case "boolPacked": {
      const byte = reader.read(Primitives.u8);
      const bools: boolean[] = [];
      for (let i = 0; i < 8; i++) bools.push((byte & (1 << i)) !== 0);
      return bools;
    }
    case "bits": {
      const field = bitsField(node.width);
      const values: number[] = [];
      for (let i = 0; i < node.count; i++) values.push(reader.read(field));
      return values;
    }
  }
}
