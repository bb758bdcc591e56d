import { describe, it, expect } from "vitest";
import { EncodingOverflowError, SchemaMismatchError } from "../errors";
import { Vector2 } from "../values";
import { describeValue, expectInstance, expectInteger, intRange, isPlainObject } from "./checks";

describe("describeValue", () => {
  it.each([
    [null, "null"],
    [undefined, "undefined"],
    [[1, 2], "array(2)"],
    [{ a: 1 }, "object"],
    [new Map(), "Map"],
    [new Vector2(), "Vector2"],
    [3n, "bigint"],
  ])("should describe %o as %s", (value, expected) => {
    expect(describeValue(value)).toBe(expected);
  });
});

describe("isPlainObject", () => {
  it("should accept literals and null-prototype objects only", () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Vector2())).toBe(false);
  });
});

describe("intRange", () => {
  it("should give inclusive bounds per width", () => {
    expect(intRange(8, true)).toEqual([-128, 127]);
    expect(intRange(16, false)).toEqual([0, 65535]);
    expect(intRange(32, true)).toEqual([-2147483648, 2147483647]);
  });
});

describe("expectInteger", () => {
  it("should pass integers in range through", () => {
    expect(expectInteger(65535, 16, false, "")).toBe(65535);
  });

  it("should prefix errors with the path", () => {
    expect(() => expectInteger(70000, 16, false, ".hp")).toThrow(
      new EncodingOverflowError("70000 out of range for UInt16 [0, 65535]", ".hp")
    );
    expect(() => expectInteger(NaN, 8, true, "[2]")).toThrow("[2]: expected integer, got NaN");
  });
});

describe("expectInstance", () => {
  it("should name the expected class", () => {
    expect(() => expectInstance("v", Vector2, ".at")).toThrow(
      new SchemaMismatchError("expected Vector2, got string", ".at")
    );
  });
});
