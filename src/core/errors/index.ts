export {
  WirepackError,
  SchemaMismatchError,
  EncodingOverflowError,
  FixedLengthViolationError,
  BufferTruncatedError,
  InvalidTypeTagError,
  InvalidCompressionLevelError,
  CompressionFailureError,
} from "./errors";
