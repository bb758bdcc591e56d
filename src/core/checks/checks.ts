import { toFloat24 } from "../buffer-codec";
import { EncodingOverflowError, SchemaMismatchError } from "../errors";
import type { TransformPrecision, VectorPrecision } from "../types";
import { Vector3 } from "../values";
import type { Transform, Vector2 } from "../values";

/**
 * Short human-readable kind of a value, for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return "object";
    return value.constructor.name || "object";
  }
  return typeof value;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * True for object literals and `Object.create(null)` objects.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number") {
    throw new SchemaMismatchError(`expected number, got ${describeValue(value)}`, path);
  }
  return value;
}

export function expectBoolean(value: unknown, path: string): boolean {
  if (typeof value !== "boolean") {
    throw new SchemaMismatchError(`expected boolean, got ${describeValue(value)}`, path);
  }
  return value;
}

export function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") {
    throw new SchemaMismatchError(`expected string, got ${describeValue(value)}`, path);
  }
  return value;
}

/**
 * Inclusive range of an integer of the given width.
 */
export function intRange(width: 8 | 16 | 32, signed: boolean): [min: number, max: number] {
  const span = Math.pow(2, width);
  return signed ? [-span / 2, span / 2 - 1] : [0, span - 1];
}

/**
 * Narrows to an integer that fits the given width.
 * Non-integers are a shape mismatch; out-of-range integers overflow.
 */
export function expectInteger(
  value: unknown,
  width: 8 | 16 | 32,
  signed: boolean,
  path: string
): number {
  const n = expectNumber(value, path);
  if (!Number.isInteger(n)) {
    throw new SchemaMismatchError(`expected integer, got ${n}`, path);
  }
  const [min, max] = intRange(width, signed);
  if (n < min || n > max) {
    throw new EncodingOverflowError(
      `${n} out of range for ${signed ? "Int" : "UInt"}${width} [${min}, ${max}]`,
      path
    );
  }
  return n;
}

/**
 * Narrows to an instance of `ctor`.
 */
export function expectInstance<T>(
  value: unknown,
  ctor: abstract new (...args: never[]) => T,
  path: string
): T {
  if (!(value instanceof ctor)) {
    throw new SchemaMismatchError(`expected ${ctor.name}, got ${describeValue(value)}`, path);
  }
  return value;
}

export type FloatPrecision = "float32" | "float24" | "float64";

const FLOAT_NAMES: Record<FloatPrecision, string> = {
  float32: "Float32",
  float24: "Float24",
  float64: "Float64",
};

function roundTo(precision: FloatPrecision, n: number): number {
  switch (precision) {
    case "float32":
      return Math.fround(n);
    case "float24":
      return toFloat24(n);
    case "float64":
      return n;
  }
}

/**
 * Narrows to a number the float format can hold.
 * NaN and the infinities pass; a finite value that would round to
 * infinity overflows.
 */
export function expectFloat(value: unknown, precision: FloatPrecision, path: string): number {
  const n = expectNumber(value, path);
  if (Number.isFinite(n) && !Number.isFinite(roundTo(precision, n))) {
    throw new EncodingOverflowError(`${n} out of range for ${FLOAT_NAMES[precision]}`, path);
  }
  return n;
}

/**
 * Checks every component of a vector against its wire precision.
 * Int16 components are rounded first.
 */
export function expectVectorComponents(
  precision: VectorPrecision,
  vector: Vector2 | Vector3,
  path: string
): void {
  const components: [string, unknown][] = [
    ["x", vector.x],
    ["y", vector.y],
  ];
  if (vector instanceof Vector3) components.push(["z", vector.z]);

  for (const [name, component] of components) {
    const at = `${path}.${name}`;
    if (precision === "int16") {
      expectInteger(Math.round(expectNumber(component, at)), 16, true, at);
    } else {
      expectFloat(component, precision, at);
    }
  }
}

export function expectTransformComponents(
  precision: TransformPrecision,
  transform: Transform,
  path: string
): void {
  expectVectorComponents(precision, transform.position, `${path}.position`);
  expectVectorComponents(precision, transform.rotation, `${path}.rotation`);
}
