import { describe, it, expect } from "vitest";
import { Color3, Transform, Vector2, Vector3 } from "./values";

describe("Color3", () => {
  it("should unpack a hex color", () => {
    const color = Color3.fromHex(0x33cc99);
    expect(color.r).toBe(51);
    expect(color.g).toBe(204);
    expect(color.b).toBe(153);
  });

  it("should pack back into the same hex value", () => {
    expect(new Color3(51, 204, 153).toHex()).toBe(0x33cc99);
  });
});

describe("vectors", () => {
  it("should default components to zero", () => {
    expect(new Vector3().equals(Vector3.zero())).toBe(true);
    expect(new Vector2(0, 0).equals(Vector2.zero())).toBe(true);
  });

  it("should compare component-wise", () => {
    expect(new Vector2(1, 2).equals(new Vector2(1, 2))).toBe(true);
    expect(new Vector3(1, 2, 3).equals(new Vector3(1, 2, 4))).toBe(false);
  });
});

describe("Transform", () => {
  it("should default to the identity", () => {
    const identity = Transform.identity();
    expect(identity.position.equals(Vector3.zero())).toBe(true);
    expect(identity.rotation.equals(Vector3.zero())).toBe(true);
  });

  it("should compare position and rotation", () => {
    const a = new Transform(new Vector3(1, 0, 0), new Vector3(0, 1, 0));
    const b = new Transform(new Vector3(1, 0, 0), new Vector3(0, 2, 0));
    expect(a.equals(a)).toBe(true);
    expect(a.equals(b)).toBe(false);
  });
});
