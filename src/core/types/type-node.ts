import type { EnumDomain } from "../values";

export type IntWidth = 8 | 16 | 32;
export type FloatWidth = 32 | 64;
export type PrefixWidth = 1 | 2;
export type BitsWidth = 8 | 16 | 32;

/** Component precision for vectors */
export type VectorPrecision = "float32" | "float24" | "int16";
/** Component precision for transforms */
export type TransformPrecision = "float32" | "float24";

/**
 * How a collection records its element count:
 * a 1- or 2-byte count prefix, or a count fixed by the schema.
 */
export type LengthMode =
  | { readonly mode: "prefixed"; readonly prefix: PrefixWidth }
  | { readonly mode: "fixed"; readonly count: number };

export type StructField = {
  readonly name: string;
  readonly type: TypeNode;
};

/**
 * Immutable description of one value's wire encoding.
 * Composite kinds own their children; schemas are trees.
 */
export type TypeNode =
  | { readonly kind: "int"; readonly width: IntWidth; readonly signed: boolean }
  | { readonly kind: "float"; readonly width: FloatWidth }
  | { readonly kind: "float24" }
  | { readonly kind: "bool" }
  | { readonly kind: "string"; readonly prefix: PrefixWidth }
  | { readonly kind: "stringFixed"; readonly length: number }
  | { readonly kind: "stringNull" }
  | { readonly kind: "void" }
  | { readonly kind: "nil" }
  | { readonly kind: "any" }
  | { readonly kind: "vector2"; readonly precision: VectorPrecision }
  | { readonly kind: "vector3"; readonly precision: VectorPrecision }
  | { readonly kind: "transform"; readonly precision: TransformPrecision }
  | { readonly kind: "color3" }
  | { readonly kind: "enum"; readonly domain: EnumDomain }
  | { readonly kind: "array"; readonly element: TypeNode; readonly length: LengthMode }
  | {
      readonly kind: "map";
      readonly key: TypeNode;
      readonly value: TypeNode;
      readonly length: LengthMode;
    }
  | { readonly kind: "struct"; readonly fields: readonly StructField[] }
  | { readonly kind: "optional"; readonly inner: TypeNode }
  | { readonly kind: "boolPacked" }
  | { readonly kind: "bits"; readonly width: BitsWidth; readonly count: number };

export type TypeKind = TypeNode["kind"];

/** Compile-time only key; no such value exists at run time. */
export declare const valueType: unique symbol;

/**
 * A TypeNode tagged with the TypeScript type of the values it encodes.
 * The tag exists only at compile time.
 */
export type Type<T> = TypeNode & { readonly [valueType]?: { readonly value: T } };

/**
 * Infer the value type from a type definition
 */
export type Infer<T> = T extends { readonly [valueType]?: { readonly value: infer V } }
  ? V
  : never;

/**
 * Infer the value tuple from a schema
 */
export type InferValues<S extends readonly Type<unknown>[]> = {
  -readonly [K in keyof S]: Infer<S[K]>;
};
