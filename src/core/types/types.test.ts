import { describe, it, expect, expectTypeOf } from "vitest";
import { EnumDomain } from "../values";
import type { EnumItem, Vector3 } from "../values";
import { Types } from "./types";
import type { Infer, InferValues } from "./type-node";

describe("Types", () => {
  it("should describe scalars by kind", () => {
    expect(Types.Int16).toEqual({ kind: "int", width: 16, signed: true });
    expect(Types.UInt32).toEqual({ kind: "int", width: 32, signed: false });
    expect(Types.Float64).toEqual({ kind: "float", width: 64 });
    expect(Types.StringTiny).toEqual({ kind: "string", prefix: 1 });
    expect(Types.Vector3Int16).toEqual({ kind: "vector3", precision: "int16" });
  });

  it("should freeze every node", () => {
    expect(Object.isFrozen(Types.UInt8)).toBe(true);
    expect(Object.isFrozen(Types.Array(Types.UInt8))).toBe(true);
    expect(Object.isFrozen(Types.Struct({ a: Types.UInt8 }))).toBe(true);
  });

  it("should keep struct fields in declaration order", () => {
    const node = Types.Struct({ Hello: Types.String, World: Types.Int32 });
    expect(node).toEqual({
      kind: "struct",
      fields: [
        { name: "Hello", type: Types.String },
        { name: "World", type: Types.Int32 },
      ],
    });
  });

  it("should record how collections store their length", () => {
    expect(Types.Array(Types.UInt8)).toMatchObject({ length: { mode: "prefixed", prefix: 2 } });
    expect(Types.ArrayTiny(Types.UInt8)).toMatchObject({ length: { mode: "prefixed", prefix: 1 } });
    expect(Types.ArrayFixed(Types.UInt8, 3)).toMatchObject({ length: { mode: "fixed", count: 3 } });
    expect(Types.MapFixed(Types.UInt8, Types.Int16, 2)).toMatchObject({
      kind: "map",
      length: { mode: "fixed", count: 2 },
    });
  });

  it("should build bit-packed integer nodes", () => {
    expect(Types.Bits._16(3)).toEqual({ kind: "bits", width: 16, count: 3 });
  });

  it("should reject invalid lengths", () => {
    expect(() => Types.StringFixed(-1)).toThrow(RangeError);
    expect(() => Types.ArrayFixed(Types.UInt8, 1.5)).toThrow(
      "ArrayFixed length must be an integer in [0, 9007199254740991], got 1.5"
    );
    expect(() => Types.Bits._8(Number.NaN)).toThrow(RangeError);
  });

  it("should carry the value type of each definition", () => {
    const State = new EnumDomain("State", ["On", "Off"]);
    const schema = [
      Types.Int32,
      Types.Optional(Types.String),
      Types.Struct({ at: Types.Vector3, state: Types.Enum(State) }),
      Types.Map(Types.StringTiny, Types.Boolean),
    ] as const;

    expectTypeOf<Infer<typeof Types.Float24>>().toEqualTypeOf<number>();
    expectTypeOf<InferValues<typeof schema>>().toEqualTypeOf<
      [
        number,
        string | undefined,
        { at: Vector3; state: EnumItem<"On" | "Off"> },
        Map<string, boolean>,
      ]
    >();
  });
});
