/**
 * Geometry and color value kinds with a fixed field layout.
 * Instances are immutable; encoders read the fields in declaration order.
 */

/** 2D vector (x, y) */
export class Vector2 {
  constructor(
    readonly x: number = 0,
    readonly y: number = 0
  ) {}

  static zero(): Vector2 {
    return new Vector2(0, 0);
  }

  equals(other: Vector2): boolean {
    return this.x === other.x && this.y === other.y;
  }
}

/** 3D vector (x, y, z) */
export class Vector3 {
  constructor(
    readonly x: number = 0,
    readonly y: number = 0,
    readonly z: number = 0
  ) {}

  static zero(): Vector3 {
    return new Vector3(0, 0, 0);
  }

  equals(other: Vector3): boolean {
    return this.x === other.x && this.y === other.y && this.z === other.z;
  }
}

/**
 * Rigid transform: a position plus a rotation stored as
 * XYZ euler angles in radians.
 */
export class Transform {
  constructor(
    readonly position: Vector3 = Vector3.zero(),
    readonly rotation: Vector3 = Vector3.zero()
  ) {}

  static identity(): Transform {
    return new Transform();
  }

  equals(other: Transform): boolean {
    return this.position.equals(other.position) && this.rotation.equals(other.rotation);
  }
}

/** RGB color with 8-bit channels (0-255) */
export class Color3 {
  constructor(
    readonly r: number = 0,
    readonly g: number = 0,
    readonly b: number = 0
  ) {}

  /**
   * Create a color from a 0xRRGGBB integer
   */
  static fromHex(hex: number): Color3 {
    return new Color3((hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff);
  }

  toHex(): number {
    return (this.r << 16) | (this.g << 8) | this.b;
  }

  equals(other: Color3): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }
}
