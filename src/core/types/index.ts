export type {
  TypeNode,
  TypeKind,
  Type,
  Infer,
  InferValues,
  LengthMode,
  StructField,
  IntWidth,
  FloatWidth,
  PrefixWidth,
  BitsWidth,
  VectorPrecision,
  TransformPrecision,
} from "./type-node";
export { Types } from "./types";
