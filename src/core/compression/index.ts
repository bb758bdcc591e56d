export type { CompressionLevel, Compressor } from "./compression";
export {
  MIN_COMPRESSION_LEVEL,
  MAX_COMPRESSION_LEVEL,
  isCompressionLevel,
  validateCompressionLevel,
  DeflateCompressor,
  CompressionAdapter,
} from "./compression";
