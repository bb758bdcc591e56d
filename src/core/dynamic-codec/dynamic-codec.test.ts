import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ByteReader, ByteWriter } from "../buffer-codec";
import { EncodingOverflowError, InvalidTypeTagError, SchemaMismatchError } from "../errors";
import { Color3, EnumDomain, Transform, Vector2, Vector3 } from "../values";
import {
  classify,
  classifyNumber,
  measureDynamic,
  readDynamic,
  TypeTag,
  writeDynamic,
} from "./dynamic-codec";
import type { DynamicContext, DynamicValue } from "./dynamic-codec";

const NO_ENUMS: DynamicContext = { enums: new Map() };

function encode(value: unknown): number[] {
  const size = measureDynamic(value);
  const writer = new ByteWriter(size);
  writeDynamic(value, writer);
  const bytes = writer.finish();
  expect(bytes.length).toBe(size);
  return Array.from(bytes);
}

function decode(bytes: number[], context: DynamicContext = NO_ENUMS): DynamicValue {
  const reader = new ByteReader(new Uint8Array(bytes));
  const value = readDynamic(reader, context);
  expect(reader.remaining).toBe(0);
  return value;
}

describe("classifyNumber", () => {
  it.each([
    [0, TypeTag.UInt8],
    [255, TypeTag.UInt8],
    [256, TypeTag.UInt16],
    [65535, TypeTag.UInt16],
    [65536, TypeTag.UInt32],
    [0xffffffff, TypeTag.UInt32],
    [-1, TypeTag.Int8],
    [-128, TypeTag.Int8],
    [-129, TypeTag.Int16],
    [-32768, TypeTag.Int16],
    [-32769, TypeTag.Int32],
    [-0x80000000, TypeTag.Int32],
    [0x100000000, TypeTag.Float64],
    [-0x80000001, TypeTag.Float64],
    [0.5, TypeTag.Float32],
    [0.1, TypeTag.Float64],
    [-0, TypeTag.Float32],
    [NaN, TypeTag.Float32],
    [Infinity, TypeTag.Float32],
  ])("should classify %d as tag %i", (value, tag) => {
    expect(classifyNumber(value)).toBe(tag);
  });
});

describe("classify", () => {
  it("should pick tags in inference order", () => {
    expect(classify(undefined).tag).toBe(TypeTag.Void);
    expect(classify(null).tag).toBe(TypeTag.Nil);
    expect(classify(false).tag).toBe(TypeTag.Boolean);
    expect(classify("x").tag).toBe(TypeTag.StringTiny);
    expect(classify("x".repeat(256)).tag).toBe(TypeTag.String);
    expect(classify(new Vector2()).tag).toBe(TypeTag.Vector2);
    expect(classify(new Vector3()).tag).toBe(TypeTag.Vector3);
    expect(classify(new Transform()).tag).toBe(TypeTag.Transform);
    expect(classify(new Color3()).tag).toBe(TypeTag.Color3);
    expect(classify([]).tag).toBe(TypeTag.Array);
    expect(classify(new Map()).tag).toBe(TypeTag.Map);
    expect(classify({}).tag).toBe(TypeTag.Object);
    expect(classify(Object.create(null)).tag).toBe(TypeTag.Object);
  });

  it("should reject values with no inferable type", () => {
    class Widget {}
    expect(() => classify(10n)).toThrow(new SchemaMismatchError("cannot infer a type for bigint", ""));
    expect(() => classify(new Date(0))).toThrow("cannot infer a type for Date");
    expect(() => classify(new Widget())).toThrow("cannot infer a type for Widget");
    expect(() => classify(() => 1)).toThrow("cannot infer a type for function");
    expect(() => classify(Symbol("s"))).toThrow(SchemaMismatchError);
  });

  it("should reject strings longer than a 2-byte prefix allows", () => {
    expect(() => classify("a".repeat(70000))).toThrow(
      new EncodingOverflowError("string of 70000 bytes exceeds 65535", "")
    );
  });
});

describe("dynamic codec", () => {
  it("should write a tag before each scalar", () => {
    expect(encode(42)).toEqual([3, 42]);
    expect(encode(-1)).toEqual([4, 0xff]);
    expect(encode(300)).toEqual([5, 1, 0x2c]);
    expect(encode(0.5)).toEqual([9, 0x3f, 0x00, 0x00, 0x00]);
    expect(encode("x")).toEqual([11, 1, 0x78]);
    expect(encode(true)).toEqual([2, 1]);
    expect(encode(null)).toEqual([0]);
    expect(encode(undefined)).toEqual([1]);
  });

  it("should tag every array element", () => {
    expect(encode([1, "a"])).toEqual([18, 0, 2, 3, 1, 11, 1, 0x61]);
    expect(decode([18, 0, 2, 3, 1, 11, 1, 0x61])).toEqual([1, "a"]);
  });

  it("should write holes in sparse arrays as Void", () => {
    const bytes = encode([1, , 3]);
    expect(bytes).toEqual([18, 0, 3, 3, 1, 1, 3, 3]);
    expect(decode(bytes)).toEqual([1, undefined, 3]);
  });

  it("should write object keys as prefixed strings", () => {
    expect(encode({ a: 1 })).toEqual([20, 0, 1, 0, 1, 0x61, 3, 1]);
    expect(decode([20, 0, 1, 0, 1, 0x61, 3, 1])).toEqual({ a: 1 });
  });

  it("should tag map keys and values", () => {
    const bytes = encode(new Map([[1, true]]));
    expect(bytes).toEqual([19, 0, 1, 3, 1, 2, 1]);
    expect(decode(bytes)).toEqual(new Map([[1, true]]));
  });

  it("should write enum items as domain name and index", () => {
    const Mode = new EnumDomain("Mode", ["A", "B"]);
    const bytes = encode(Mode.get("B"));
    expect(bytes).toEqual([17, 4, 0x4d, 0x6f, 0x64, 0x65, 0, 1]);
    expect(decode(bytes, { enums: new Map([["Mode", Mode]]) })).toBe(Mode.get("B"));
  });

  it("should reject enum items whose domain is unknown", () => {
    expect(() => decode([17, 4, 0x4d, 0x6f, 0x64, 0x65, 0, 1])).toThrow(
      new SchemaMismatchError('unknown enum domain "Mode"', "")
    );
  });

  it("should round-trip value kinds", () => {
    const values = [
      new Vector2(1.5, -2),
      new Vector3(0.25, 8, -1),
      new Transform(new Vector3(1, 2, 3), new Vector3(0, 0.5, 0)),
      new Color3(1, 2, 3),
    ];
    for (const value of values) {
      expect(decode(encode(value))).toEqual(value);
    }
  });

  it("should round-trip nested structures", () => {
    const value = {
      name: "crate",
      tags: ["wood", null, 3],
      at: new Vector3(1, 0, 1),
      extra: new Map<DynamicValue, DynamicValue>([["hp", 100]]),
    };
    expect(decode(encode(value))).toEqual(value);
  });

  it("should keep a __proto__ key as an own property", () => {
    const input: unknown = JSON.parse('{"__proto__": 5}');
    const decoded = decode(encode(input));

    expect(Object.getOwnPropertyDescriptor(decoded, "__proto__")?.value).toBe(5);
    expect(Object.getPrototypeOf(decoded)).toBe(Object.prototype);
  });

  it("should throw InvalidTypeTagError for unknown tags", () => {
    expect(() => decode([99])).toThrow(new InvalidTypeTagError(99));
  });

  it("should name the nested value that failed", () => {
    expect(() => measureDynamic([{ a: 1n }])).toThrow("[0].a: cannot infer a type for bigint");
    expect(() => measureDynamic({ c: new Color3(300, 0, 0) })).toThrow(
      ".c.r: 300 out of range for UInt8 [0, 255]"
    );
  });

  it("should reject vector components beyond Float32", () => {
    expect(() => measureDynamic(new Vector3(0, 0, 1e39))).toThrow(
      new EncodingOverflowError("1e+39 out of range for Float32", ".z")
    );
    const transform = new Transform(new Vector3(-1e39, 0, 0), new Vector3());
    expect(() => encode({ t: transform })).toThrow(".t.position.x: -1e+39 out of range for Float32");
  });

  it("should round-trip every double exactly", () => {
    fc.assert(
      fc.property(fc.double(), (value) => {
        const decoded = decode(encode(value));
        expect(Object.is(decoded, value)).toBe(true);
      })
    );
  });

  it("should round-trip any string", () => {
    fc.assert(
      fc.property(fc.fullUnicodeString(), (value) => {
        expect(decode(encode(value))).toBe(value);
      })
    );
  });
});
