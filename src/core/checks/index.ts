export {
  describeValue,
  isRecord,
  isPlainObject,
  expectNumber,
  expectBoolean,
  expectString,
  expectInteger,
  expectInstance,
  intRange,
  expectFloat,
  expectVectorComponents,
  expectTransformComponents,
} from "./checks";
export type { FloatPrecision } from "./checks";
