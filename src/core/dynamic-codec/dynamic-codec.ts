import { ByteReader, ByteWriter, Primitives, utf8Length } from "../buffer-codec";
import type { Field } from "../buffer-codec";
import {
  describeValue,
  expectInteger,
  expectTransformComponents,
  expectVectorComponents,
  isPlainObject,
} from "../checks";
import {
  EncodingOverflowError,
  InvalidTypeTagError,
  SchemaMismatchError,
} from "../errors";
import { Color3, EnumDomain, EnumItem, Transform, Vector2, Vector3 } from "../values";

/**
 * Any value the dynamic protocol can infer a type for.
 */
export type DynamicValue =
  | undefined
  | null
  | boolean
  | number
  | string
  | Vector2
  | Vector3
  | Transform
  | Color3
  | EnumItem
  | DynamicValue[]
  | DynamicMap
  | DynamicObject;

export interface DynamicMap extends Map<DynamicValue, DynamicValue> {}

export interface DynamicObject {
  [key: string]: DynamicValue;
}

/**
 * One-byte type tags written before each dynamic value.
 * Values are part of the wire format and must never be renumbered.
 */
export enum TypeTag {
  Nil = 0,
  Void = 1,
  Boolean = 2,
  UInt8 = 3,
  Int8 = 4,
  UInt16 = 5,
  Int16 = 6,
  UInt32 = 7,
  Int32 = 8,
  Float32 = 9,
  Float64 = 10,
  StringTiny = 11,
  String = 12,
  Vector2 = 13,
  Vector3 = 14,
  Transform = 15,
  Color3 = 16,
  EnumItem = 17,
  Array = 18,
  Map = 19,
  Object = 20,
}

type NumericTag =
  | TypeTag.UInt8
  | TypeTag.Int8
  | TypeTag.UInt16
  | TypeTag.Int16
  | TypeTag.UInt32
  | TypeTag.Int32
  | TypeTag.Float32
  | TypeTag.Float64;

const NUMERIC_FIELDS: Record<NumericTag, Field<number>> = {
  [TypeTag.UInt8]: Primitives.u8,
  [TypeTag.Int8]: Primitives.i8,
  [TypeTag.UInt16]: Primitives.u16,
  [TypeTag.Int16]: Primitives.i16,
  [TypeTag.UInt32]: Primitives.u32,
  [TypeTag.Int32]: Primitives.i32,
  [TypeTag.Float32]: Primitives.f32,
  [TypeTag.Float64]: Primitives.f64,
};

/**
 * A value paired with the tag inference chose for it.
 */
export type Classified =
  | { readonly tag: TypeTag.Nil; readonly value: null }
  | { readonly tag: TypeTag.Void; readonly value: undefined }
  | { readonly tag: TypeTag.Boolean; readonly value: boolean }
  | { readonly tag: NumericTag; readonly value: number }
  | { readonly tag: TypeTag.StringTiny | TypeTag.String; readonly value: string; readonly length: number }
  | { readonly tag: TypeTag.Vector2; readonly value: Vector2 }
  | { readonly tag: TypeTag.Vector3; readonly value: Vector3 }
  | { readonly tag: TypeTag.Transform; readonly value: Transform }
  | { readonly tag: TypeTag.Color3; readonly value: Color3 }
  | { readonly tag: TypeTag.EnumItem; readonly value: EnumItem }
  | { readonly tag: TypeTag.Array; readonly value: readonly unknown[] }
  | { readonly tag: TypeTag.Map; readonly value: ReadonlyMap<unknown, unknown> }
  | { readonly tag: TypeTag.Object; readonly value: Record<string, unknown> };

/** Max elements / entries in a dynamic array, map or object */
export const MAX_DYNAMIC_COUNT = 0xffff;

/**
 * Narrowest lossless numeric tag.
 *
 * Integers take the first of UInt8, Int8, UInt16, Int16, UInt32, Int32
 * that holds them, else Float64. Other numbers (including -0, NaN and
 * the infinities) take Float32 when it represents them exactly, else Float64.
 */
export function classifyNumber(value: number): NumericTag {
  if (Number.isInteger(value) && !Object.is(value, -0)) {
    if (value >= 0) {
      if (value <= 0xff) return TypeTag.UInt8;
      if (value <= 0xffff) return TypeTag.UInt16;
      if (value <= 0xffffffff) return TypeTag.UInt32;
    } else {
      if (value >= -0x80) return TypeTag.Int8;
      if (value >= -0x8000) return TypeTag.Int16;
      if (value >= -0x80000000) return TypeTag.Int32;
    }
    return TypeTag.Float64;
  }
  return Object.is(Math.fround(value), value) ? TypeTag.Float32 : TypeTag.Float64;
}

/**
 * Infers the tag for a value. Rules are tried in a fixed order and the
 * first match wins; this order is part of the wire contract.
 */
export function classify(value: unknown, path = ""): Classified {
  if (value === undefined) return { tag: TypeTag.Void, value };
  if (value === null) return { tag: TypeTag.Nil, value };
  if (typeof value === "boolean") return { tag: TypeTag.Boolean, value };
  if (typeof value === "number") return { tag: classifyNumber(value), value };

  if (typeof value === "string") {
    const length = utf8Length(value);
    if (length > 0xffff) {
      throw new EncodingOverflowError(`string of ${length} bytes exceeds 65535`, path);
    }
    return { tag: length <= 0xff ? TypeTag.StringTiny : TypeTag.String, value, length };
  }

  if (value instanceof Vector2) return { tag: TypeTag.Vector2, value };
  if (value instanceof Vector3) return { tag: TypeTag.Vector3, value };
  if (value instanceof Transform) return { tag: TypeTag.Transform, value };
  if (value instanceof Color3) return { tag: TypeTag.Color3, value };
  if (value instanceof EnumItem) return { tag: TypeTag.EnumItem, value };

  if (Array.isArray(value)) return { tag: TypeTag.Array, value };
  if (value instanceof Map) return { tag: TypeTag.Map, value };
  if (isPlainObject(value)) return { tag: TypeTag.Object, value };

  throw new SchemaMismatchError(`cannot infer a type for ${describeValue(value)}`, path);
}

function checkCount(count: number, path: string): void {
  if (count > MAX_DYNAMIC_COUNT) {
    throw new EncodingOverflowError(`${count} entries exceed ${MAX_DYNAMIC_COUNT}`, path);
  }
}

function checkColor(color: Color3, path: string): void {
  expectInteger(color.r, 8, false, `${path}.r`);
  expectInteger(color.g, 8, false, `${path}.g`);
  expectInteger(color.b, 8, false, `${path}.b`);
}

function domainNameLength(item: EnumItem, path: string): number {
  const length = utf8Length(item.domain.name);
  if (length > 0xff) {
    throw new EncodingOverflowError(`enum domain name of ${length} bytes exceeds 255`, path);
  }
  return length;
}

/**
 * Encoded size of a value including its tag.
 * Validates the value the same way writing it would.
 */
export function measureDynamic(value: unknown, path = ""): number {
  const c = classify(value, path);
  let size = 1;

  switch (c.tag) {
    case TypeTag.Nil:
    case TypeTag.Void:
      break;
    case TypeTag.Boolean:
      size += 1;
      break;
    case TypeTag.StringTiny:
      size += 1 + c.length;
      break;
    case TypeTag.String:
      size += 2 + c.length;
      break;
    case TypeTag.Vector2:
      expectVectorComponents("float32", c.value, path);
      size += Primitives.vec2.size;
      break;
    case TypeTag.Vector3:
      expectVectorComponents("float32", c.value, path);
      size += Primitives.vec3.size;
      break;
    case TypeTag.Transform:
      expectTransformComponents("float32", c.value, path);
      size += Primitives.transform.size;
      break;
    case TypeTag.Color3:
      checkColor(c.value, path);
      size += Primitives.color3.size;
      break;
    case TypeTag.EnumItem:
      size += 1 + domainNameLength(c.value, path) + 2;
      break;
    case TypeTag.Array:
      checkCount(c.value.length, path);
      size += 2;
      // Index loop: holes in sparse arrays are written as Void
      for (let i = 0; i < c.value.length; i++) {
        size += measureDynamic(c.value[i], `${path}[${i}]`);
      }
      break;
    case TypeTag.Map: {
      checkCount(c.value.size, path);
      size += 2;
      let i = 0;
      for (const [key, entry] of c.value) {
        size += measureDynamic(key, `${path}[key ${i}]`);
        size += measureDynamic(entry, `${path}[value ${i}]`);
        i++;
      }
      break;
    }
    case TypeTag.Object: {
      const keys = Object.keys(c.value);
      checkCount(keys.length, path);
      size += 2;
      for (const key of keys) {
        const keyLength = utf8Length(key);
        if (keyLength > 0xffff) {
          throw new EncodingOverflowError(`key of ${keyLength} bytes exceeds 65535`, path);
        }
        size += 2 + keyLength + measureDynamic(c.value[key], `${path}.${key}`);
      }
      break;
    }
    default:
      size += NUMERIC_FIELDS[c.tag].size;
  }

  return size;
}

/**
 * Writes a tag followed by the value's payload.
 */
export function writeDynamic(value: unknown, writer: ByteWriter, path = ""): void {
  const c = classify(value, path);
  writer.write(Primitives.u8, c.tag);

  switch (c.tag) {
    case TypeTag.Nil:
    case TypeTag.Void:
      return;
    case TypeTag.Boolean:
      writer.write(Primitives.bool, c.value);
      return;
    case TypeTag.StringTiny:
      writer.writeString(c.value, 1);
      return;
    case TypeTag.String:
      writer.writeString(c.value, 2);
      return;
    case TypeTag.Vector2:
      expectVectorComponents("float32", c.value, path);
      writer.write(Primitives.vec2, c.value);
      return;
    case TypeTag.Vector3:
      expectVectorComponents("float32", c.value, path);
      writer.write(Primitives.vec3, c.value);
      return;
    case TypeTag.Transform:
      expectTransformComponents("float32", c.value, path);
      writer.write(Primitives.transform, c.value);
      return;
    case TypeTag.Color3:
      checkColor(c.value, path);
      writer.write(Primitives.color3, c.value);
      return;
    case TypeTag.EnumItem:
      domainNameLength(c.value, path);
      writer.writeString(c.value.domain.name, 1);
      writer.write(Primitives.u16, c.value.index);
      return;
    case TypeTag.Array:
      checkCount(c.value.length, path);
      writer.write(Primitives.u16, c.value.length);
      for (let i = 0; i < c.value.length; i++) {
        writeDynamic(c.value[i], writer, `${path}[${i}]`);
      }
      return;
    case TypeTag.Map: {
      checkCount(c.value.size, path);
      writer.write(Primitives.u16, c.value.size);
      let i = 0;
      for (const [key, entry] of c.value) {
        writeDynamic(key, writer, `${path}[key ${i}]`);
        writeDynamic(entry, writer, `${path}[value ${i}]`);
        i++;
      }
      return;
    }
    case TypeTag.Object: {
      const keys = Object.keys(c.value);
      checkCount(keys.length, path);
      writer.write(Primitives.u16, keys.length);
      for (const key of keys) {
        writer.writeString(key, 2);
        writeDynamic(c.value[key], writer, `${path}.${key}`);
      }
      return;
    }
    default:
      writer.write(NUMERIC_FIELDS[c.tag], c.value);
  }
}

/**
 * Decoding context shared by nested dynamic values.
 */
export type DynamicContext = {
  /** Enum domains by name, for resolving EnumItem tags */
  readonly enums: ReadonlyMap<string, EnumDomain>;
};

function isTypeTag(tag: number): tag is TypeTag {
  return tag in TypeTag;
}

/**
 * Reads one tag and the value it announces.
 */
export function readDynamic(reader: ByteReader, context: DynamicContext, path = ""): DynamicValue {
  const tag = reader.read(Primitives.u8);
  if (!isTypeTag(tag)) {
    throw new InvalidTypeTagError(tag);
  }

  switch (tag) {
    case TypeTag.Nil:
      return null;
    case TypeTag.Void:
      return undefined;
    case TypeTag.Boolean:
      return reader.read(Primitives.bool);
    case TypeTag.StringTiny:
      return reader.readString(1);
    case TypeTag.String:
      return reader.readString(2);
    case TypeTag.Vector2:
      return reader.read(Primitives.vec2);
    case TypeTag.Vector3:
      return reader.read(Primitives.vec3);
    case TypeTag.Transform:
      return reader.read(Primitives.transform);
    case TypeTag.Color3:
      return reader.read(Primitives.color3);
    case TypeTag.EnumItem: {
      const domainName = reader.readString(1);
      const index = reader.read(Primitives.u16);
      const domain = context.enums.get(domainName);
      if (!domain) {
        throw new SchemaMismatchError(`unknown enum domain "${domainName}"`, path);
      }
      const item = domain.at(index);
      if (!item) {
        throw new SchemaMismatchError(`index ${index} out of range for enum "${domainName}"`, path);
      }
      return item;
    }
    case TypeTag.Array: {
      const count = reader.read(Primitives.u16);
      const out: DynamicValue[] = [];
      for (let i = 0; i < count; i++) {
        out.push(readDynamic(reader, context, `${path}[${i}]`));
      }
      return out;
    }
    case TypeTag.Map: {
      const count = reader.read(Primitives.u16);
      const out: DynamicMap = new Map();
      for (let i = 0; i < count; i++) {
        const key = readDynamic(reader, context, `${path}[key ${i}]`);
        out.set(key, readDynamic(reader, context, `${path}[value ${i}]`));
      }
      return out;
    }
    case TypeTag.Object: {
      const count = reader.read(Primitives.u16);
      const out: DynamicObject = {};
      for (let i = 0; i < count; i++) {
        const key = reader.readString(2);
        // defineProperty so a "__proto__" key stays an own property
        Object.defineProperty(out, key, {
          value: readDynamic(reader, context, `${path}.${key}`),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    }
    default:
      return reader.read(NUMERIC_FIELDS[tag]);
  }
}
