export type { Field } from "./buffer-codec";
export {
  Primitives,
  ByteWriter,
  ByteReader,
  utf8Encode,
  utf8Decode,
  utf8Length,
} from "./buffer-codec";
export { encodeFloat24, decodeFloat24, toFloat24, FLOAT24_MAX } from "./float24";
