import { BufferTruncatedError, EncodingOverflowError } from "../errors";
import { Color3, Transform, Vector2, Vector3 } from "../values";
import { decodeFloat24, encodeFloat24 } from "./float24";

/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized
 * at a fixed byte size.
 *
 * All multi-byte fields are big-endian.
 */
export type Field<T> = {
  /** Size of the field in bytes */
  readonly size: number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;
};

/**
 * Big-endian two's-complement integer spanning `size` bytes.
 * Values are assumed validated; out-of-range input wraps.
 */
function intField(size: 1 | 2 | 3 | 4, signed: boolean): Field<number> {
  const span = Math.pow(2, size * 8);
  return {
    size,
    write(dv, o, v) {
      let bits = v | 0;
      for (let i = size - 1; i >= 0; i--) {
        dv.setUint8(o + i, bits & 0xff);
        bits >>= 8;
      }
    },
    read(dv, o) {
      let value = 0;
      for (let i = 0; i < size; i++) value = value * 256 + dv.getUint8(o + i);
      return signed && value >= span / 2 ? value - span : value;
    },
  };
}

function floatField(width: 32 | 64): Field<number> {
  if (width === 32) {
    return {
      size: 4,
      write: (dv, o, v) => dv.setFloat32(o, v, false),
      read: (dv, o) => dv.getFloat32(o, false),
    };
  }
  return {
    size: 8,
    write: (dv, o, v) => dv.setFloat64(o, v, false),
    read: (dv, o) => dv.getFloat64(o, false),
  };
}

/** Rounds to the nearest integer before writing */
function rounded(field: Field<number>): Field<number> {
  return {
    size: field.size,
    write: (dv, o, v) => field.write(dv, o, Math.round(v)),
    read: field.read,
  };
}

const U24 = intField(3, false);

const F32 = floatField(32);

const F24: Field<number> = {
  size: 3,
  write: (dv, o, v) => U24.write(dv, o, encodeFloat24(v)),
  read: (dv, o) => decodeFloat24(U24.read(dv, o)),
};

const I16 = rounded(intField(2, true));

function vector2Field(c: Field<number>): Field<Vector2> {
  return {
    size: c.size * 2,
    write(dv, o, v) {
      c.write(dv, o, v.x);
      c.write(dv, o + c.size, v.y);
    },
    read: (dv, o) => new Vector2(c.read(dv, o), c.read(dv, o + c.size)),
  };
}

function vector3Field(c: Field<number>): Field<Vector3> {
  return {
    size: c.size * 3,
    write(dv, o, v) {
      c.write(dv, o, v.x);
      c.write(dv, o + c.size, v.y);
      c.write(dv, o + c.size * 2, v.z);
    },
    read: (dv, o) =>
      new Vector3(c.read(dv, o), c.read(dv, o + c.size), c.read(dv, o + c.size * 2)),
  };
}

function transformField(c: Field<number>): Field<Transform> {
  const vec = vector3Field(c);
  return {
    size: vec.size * 2,
    write(dv, o, v) {
      vec.write(dv, o, v.position);
      vec.write(dv, o + vec.size, v.rotation);
    },
    read: (dv, o) => new Transform(vec.read(dv, o), vec.read(dv, o + vec.size)),
  };
}

/**
 * Built-in binary primitive field definitions.
 */
export class Primitives {
  /** Unsigned 8-bit integer */
  static readonly u8 = intField(1, false);
  /** Unsigned 16-bit integer */
  static readonly u16 = intField(2, false);
  /** Unsigned 32-bit integer */
  static readonly u32 = intField(4, false);
  /** Signed 8-bit integer */
  static readonly i8 = intField(1, true);
  /** Signed 16-bit integer */
  static readonly i16 = intField(2, true);
  /** Signed 32-bit integer */
  static readonly i32 = intField(4, true);

  /** IEEE 754 single */
  static readonly f32 = F32;
  /** IEEE 754 double */
  static readonly f64 = floatField(64);
  /** Reduced-precision 24-bit float, see float24.ts */
  static readonly f24 = F24;

  /** Boolean stored as 1 byte (0 = false, 1 = true) */
  static readonly bool: Field<boolean> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v ? 1 : 0),
    read: (dv, o) => dv.getUint8(o) !== 0,
  };

  /** 2D vector of f32 (x, y) */
  static readonly vec2 = vector2Field(F32);
  /** 2D vector of Float24 (x, y) */
  static readonly vec2f24 = vector2Field(F24);
  /** 2D vector of i16, components rounded to integers */
  static readonly vec2i16 = vector2Field(I16);

  /** 3D vector of f32 (x, y, z) */
  static readonly vec3 = vector3Field(F32);
  /** 3D vector of Float24 (x, y, z) */
  static readonly vec3f24 = vector3Field(F24);
  /** 3D vector of i16, components rounded to integers */
  static readonly vec3i16 = vector3Field(I16);

  /** Transform as position then rotation, 6 x f32 */
  static readonly transform = transformField(F32);
  /** Transform as position then rotation, 6 x Float24 */
  static readonly transformf24 = transformField(F24);

  /** RGB color packed as 3 u8 bytes */
  static readonly color3: Field<Color3> = {
    size: 3,
    write(dv, o, v) {
      dv.setUint8(o, v.r);
      dv.setUint8(o + 1, v.g);
      dv.setUint8(o + 2, v.b);
    },
    read: (dv, o) => new Color3(dv.getUint8(o), dv.getUint8(o + 1), dv.getUint8(o + 2)),
  };
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

export function utf8Encode(value: string): Uint8Array {
  return textEncoder.encode(value);
}

export function utf8Decode(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/**
 * Byte length of a string once UTF-8 encoded, without allocating.
 */
export function utf8Length(value: string): number {
  let length = 0;
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code < 0x80) length += 1;
    else if (code < 0x800) length += 2;
    else if (code >= 0xd800 && code <= 0xdbff && i + 1 < value.length) {
      const next = value.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        length += 4;
        i++;
      } else {
        length += 3;
      }
    } else length += 3;
  }
  return length;
}

/**
 * Cursor-based writer over a growable byte region.
 *
 * Writers sized up front never reallocate; otherwise capacity doubles
 * whenever a write would run past the end.
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private position: number;

  /**
   * @param initialCapacity Bytes to allocate up front
   */
  constructor(initialCapacity = 256) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
    this.position = 0;
  }

  /**
   * Creates a writer over an existing buffer, starting at `offset`.
   * Bytes before `offset` are never written.
   */
  static over(buffer: Uint8Array, offset: number): ByteWriter {
    const writer = new ByteWriter(0);
    writer.buffer = buffer;
    writer.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    writer.position = offset;
    return writer;
  }

  /** Current write position */
  get offset(): number {
    return this.position;
  }

  /** Currently allocated size in bytes */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Writes a fixed-size field and advances the cursor.
   */
  write<T>(field: Field<T>, value: T): void {
    this.ensure(field.size);
    field.write(this.view, this.position, value);
    this.position += field.size;
  }

  /**
   * Copies raw bytes and advances the cursor.
   */
  writeBytes(bytes: Uint8Array): void {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.position);
    this.position += bytes.length;
  }

  /**
   * Writes a UTF-8 string behind a 1- or 2-byte length prefix.
   * Callers validate the length against the prefix first; this is the last check.
   */
  writeString(value: string, prefix: 1 | 2): void {
    const bytes = utf8Encode(value);
    const max = prefix === 1 ? 0xff : 0xffff;
    if (bytes.length > max) {
      throw new EncodingOverflowError(`string of ${bytes.length} bytes exceeds ${max}`, "");
    }
    this.write(prefix === 1 ? Primitives.u8 : Primitives.u16, bytes.length);
    this.writeBytes(bytes);
  }

  /**
   * Writes `count` zero bytes.
   */
  writeZeros(count: number): void {
    this.ensure(count);
    this.buffer.fill(0, this.position, this.position + count);
    this.position += count;
  }

  /**
   * Returns the bytes written so far, from the start of the region.
   * The result always owns an ArrayBuffer of exactly its own length, so
   * spare capacity never leaks through `result.buffer`.
   */
  finish(): Uint8Array {
    return this.position === this.buffer.length
      ? this.buffer
      : this.buffer.slice(0, this.position);
  }

  private ensure(n: number): void {
    const required = this.position + n;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length;
    while (capacity < required) capacity *= 2;

    const grown = new Uint8Array(capacity);
    grown.set(this.buffer);
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }
}

/**
 * Cursor-based reader. Every read checks the remaining length first.
 */
export class ByteReader {
  private readonly view: DataView;
  private position: number;

  constructor(private readonly bytes: Uint8Array, offset = 0) {
    if (offset > bytes.length) {
      throw new BufferTruncatedError(offset, bytes.length);
    }
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.position = offset;
  }

  /** Current read position */
  get offset(): number {
    return this.position;
  }

  /** Bytes left to read */
  get remaining(): number {
    return this.bytes.length - this.position;
  }

  /**
   * Reads a fixed-size field and advances the cursor.
   */
  read<T>(field: Field<T>): T {
    this.require(field.size);
    const value = field.read(this.view, this.position);
    this.position += field.size;
    return value;
  }

  /**
   * Returns a view of the next `length` bytes and advances the cursor.
   */
  readBytes(length: number): Uint8Array {
    this.require(length);
    const slice = this.bytes.subarray(this.position, this.position + length);
    this.position += length;
    return slice;
  }

  /**
   * Reads a UTF-8 string behind a 1- or 2-byte length prefix.
   */
  readString(prefix: 1 | 2): string {
    const length = this.read(prefix === 1 ? Primitives.u8 : Primitives.u16);
    return utf8Decode(this.readBytes(length));
  }

  /**
   * Position of the next occurrence of `byte` at or after the cursor, or -1.
   */
  indexOf(byte: number): number {
    return this.bytes.indexOf(byte, this.position);
  }

  private require(n: number): void {
    if (this.remaining < n) {
      throw new BufferTruncatedError(n, this.remaining);
    }
  }
}
