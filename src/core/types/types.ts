import type { Color3, EnumDomain, EnumItem, Transform, Vector2, Vector3 } from "../values";
import type { DynamicValue } from "../dynamic-codec";
import type {
  BitsWidth,
  Infer,
  IntWidth,
  LengthMode,
  PrefixWidth,
  StructField,
  Type,
  TypeNode,
  VectorPrecision,
} from "./type-node";

function define<T>(node: TypeNode): Type<T> {
  return Object.freeze(node);
}

function assertCount(what: string, count: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(count) || count < 0 || count > max) {
    throw new RangeError(`${what} must be an integer in [0, ${max}], got ${count}`);
  }
}

const int = (width: IntWidth, signed: boolean) => define<number>({ kind: "int", width, signed });
const vector2 = (precision: VectorPrecision) => define<Vector2>({ kind: "vector2", precision });
const vector3 = (precision: VectorPrecision) => define<Vector3>({ kind: "vector3", precision });

const prefixed = (prefix: PrefixWidth): LengthMode => ({ mode: "prefixed", prefix });

function fixed(what: string, count: number): LengthMode {
  assertCount(what, count);
  return { mode: "fixed", count };
}

function array<T>(element: Type<T>, length: LengthMode): Type<T[]> {
  return define<T[]>({ kind: "array", element, length });
}

function map<K, V>(key: Type<K>, value: Type<V>, length: LengthMode): Type<Map<K, V>> {
  return define<Map<K, V>>({ kind: "map", key, value, length });
}

function bits(width: BitsWidth) {
  return (count: number): Type<number[]> => {
    assertCount("Bits count", count);
    return define<number[]>({ kind: "bits", width, count });
  };
}

/**
 * Type definitions for schemas.
 *
 * Every member is an immutable TypeNode (or a pure function returning one).
 *
 * @example
 * ```ts
 * const schema = [
 *   Types.Int32,
 *   Types.String,
 *   Types.Struct({ Hello: Types.String, World: Types.Int32 }),
 * ] as const;
 * ```
 */
export const Types = {
  UInt8: int(8, false),
  Int8: int(8, true),
  UInt16: int(16, false),
  Int16: int(16, true),
  UInt32: int(32, false),
  Int32: int(32, true),

  Float32: define<number>({ kind: "float", width: 32 }),
  Float64: define<number>({ kind: "float", width: 64 }),
  /** 3-byte reduced-precision float */
  Float24: define<number>({ kind: "float24" }),

  Boolean: define<boolean>({ kind: "bool" }),

  /** UTF-8 with a 2-byte length prefix, max 65 535 bytes */
  String: define<string>({ kind: "string", prefix: 2 }),
  /** UTF-8 with a 1-byte length prefix, max 255 bytes */
  StringTiny: define<string>({ kind: "string", prefix: 1 }),
  /** UTF-8 terminated by a zero byte; the payload may not contain one */
  StringNull: define<string>({ kind: "stringNull" }),

  /**
   * UTF-8 padded with zero bytes (or truncated at a character boundary)
   * to exactly `length` bytes. Trailing zero bytes are dropped on decode.
   */
  StringFixed(length: number): Type<string> {
    assertCount("StringFixed length", length);
    return define<string>({ kind: "stringFixed", length });
  },

  /** Zero-width, encodes `undefined` */
  Void: define<undefined>({ kind: "void" }),
  /** Zero-width, encodes `null` */
  Nil: define<null>({ kind: "nil" }),
  /** Any inferable value, written with a type tag */
  Any: define<DynamicValue>({ kind: "any" }),

  Vector2: vector2("float32"),
  Vector2Float24: vector2("float24"),
  Vector2Int16: vector2("int16"),
  Vector3: vector3("float32"),
  Vector3Float24: vector3("float24"),
  Vector3Int16: vector3("int16"),
  Transform: define<Transform>({ kind: "transform", precision: "float32" }),
  TransformFloat24: define<Transform>({ kind: "transform", precision: "float24" }),
  Color3: define<Color3>({ kind: "color3" }),

  Enum<N extends string>(domain: EnumDomain<N>): Type<EnumItem<N>> {
    return define<EnumItem<N>>({ kind: "enum", domain });
  },

  /** Up to 65 535 elements */
  Array<T>(element: Type<T>): Type<T[]> {
    return array(element, prefixed(2));
  },

  /** Up to 255 elements */
  ArrayTiny<T>(element: Type<T>): Type<T[]> {
    return array(element, prefixed(1));
  },

  /** Exactly `count` elements, no prefix */
  ArrayFixed<T>(element: Type<T>, count: number): Type<T[]> {
    return array(element, fixed("ArrayFixed length", count));
  },

  /** Up to 65 535 entries */
  Map<K, V>(key: Type<K>, value: Type<V>): Type<Map<K, V>> {
    return map(key, value, prefixed(2));
  },

  /** Up to 255 entries */
  MapTiny<K, V>(key: Type<K>, value: Type<V>): Type<Map<K, V>> {
    return map(key, value, prefixed(1));
  },

  /** Exactly `count` entries, no prefix */
  MapFixed<K, V>(key: Type<K>, value: Type<V>, count: number): Type<Map<K, V>> {
    return map(key, value, fixed("MapFixed length", count));
  },

  /**
   * Named fields encoded in the key order of `fields`.
   *
   * Integer-like keys ("0", "1", ...) are ordered numerically by
   * JavaScript itself and will come first.
   */
  Struct<F extends Record<string, Type<unknown>>>(
    fields: F
  ): Type<{ [K in keyof F]: Infer<F[K]> }> {
    const list: StructField[] = Object.entries(fields).map(([name, type]) => ({ name, type }));
    return define<{ [K in keyof F]: Infer<F[K]> }>({
      kind: "struct",
      fields: Object.freeze(list),
    });
  },

  /** 1-byte presence flag, then the inner value if present */
  Optional<T>(inner: Type<T>): Type<T | undefined> {
    return define<T | undefined>({ kind: "optional", inner });
  },

  /** Exactly 8 booleans in one byte, element i in bit i (LSB first) */
  BoolPacked: define<boolean[]>({ kind: "boolPacked" }),

  /** `count` unsigned integers of the stated width, no prefix */
  Bits: {
    _8: bits(8),
    _16: bits(16),
    _32: bits(32),
  },
} as const;
