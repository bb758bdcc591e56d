import { CompressionAdapter } from "../core/compression";
import type { CompressionLevel, Compressor } from "../core/compression";
import { BufferTruncatedError } from "../core/errors";
import type { CodecContext } from "../core/node-codec";
import type { EnumDomain } from "../core/values";

/**
 * Options shared by static and dynamic serializers.
 */
export interface SerializerConfig {
  /** DEFLATE level 0-9 for the payload region; omit to disable compression */
  compressionLevel?: number;
  /** Byte transform used when compressing (default: DeflateCompressor) */
  compressor?: Compressor;
  /** Enum domains that dynamic values may reference, resolved by name */
  enums?: readonly EnumDomain[];
  /** Log byte counts per call (default: false) */
  debug?: boolean;
}

/**
 * Throws unless `offset` is a non-negative integer.
 */
export function checkOffset(offset: number): void {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`Offset must be a non-negative integer, got ${offset}`);
  }
}

function indexEnums(enums: readonly EnumDomain[]): Map<string, EnumDomain> {
  const byName = new Map<string, EnumDomain>();
  for (const domain of enums) {
    const existing = byName.get(domain.name);
    if (existing && existing !== domain) {
      throw new Error(`Two enum domains are named "${domain.name}"`);
    }
    byName.set(domain.name, domain);
  }
  return byName;
}

/**
 * Wire envelope shared by both engines:
 * ```
 * ┌─────────────────────┬──────────────────────────────┐
 * │   Reserved offset   │  Payload (raw or compressed) │
 * │   (never touched)   │                              │
 * └─────────────────────┴──────────────────────────────┘
 * ```
 * Configuration is resolved once here; instances are immutable and can
 * be shared freely.
 */
export abstract class BaseSerializer {
  protected readonly compression: CompressionAdapter | undefined;
  protected readonly context: CodecContext;
  private readonly compressor: Compressor | undefined;
  private readonly debug: boolean;

  constructor(private readonly name: string, config: SerializerConfig = {}) {
    this.compression =
      config.compressionLevel === undefined
        ? undefined
        : new CompressionAdapter(config.compressionLevel, config.compressor);
    this.compressor = config.compressor;
    this.context = { enums: indexEnums(config.enums ?? []) };
    this.debug = config.debug ?? false;
  }

  /** Configured compression level, if compression is enabled */
  get compressionLevel(): CompressionLevel | undefined {
    return this.compression?.level;
  }

  /**
   * Adapter for a single call. A per-call `level` overrides the configured
   * one and is validated here, before any encode or decode work.
   */
  protected compressionFor(level: number | undefined): CompressionAdapter | undefined {
    if (level === undefined) return this.compression;
    if (this.compression?.level === level) return this.compression;
    return new CompressionAdapter(level, this.compressor);
  }

  /**
   * Places an assembled payload after `offset` zeroed bytes,
   * compressing it first when configured.
   */
  protected assemble(
    payload: Uint8Array,
    offset: number,
    compression: CompressionAdapter | undefined = this.compression
  ): Uint8Array {
    const body = compression ? compression.wrap(payload) : payload;
    const out = new Uint8Array(offset + body.length);
    out.set(body, offset);
    return out;
  }

  /**
   * Returns the bytes to decode and where the payload starts in them.
   * Compressed payloads are inflated into a fresh buffer.
   */
  protected openPayload(
    buffer: Uint8Array,
    offset: number,
    compression: CompressionAdapter | undefined = this.compression
  ): { bytes: Uint8Array; start: number } {
    checkOffset(offset);
    if (offset > buffer.length) {
      throw new BufferTruncatedError(offset, buffer.length);
    }
    if (compression) {
      return { bytes: compression.unwrap(buffer.subarray(offset)), start: 0 };
    }
    return { bytes: buffer, start: offset };
  }

  /**
   * Debug logging
   */
  protected log(message: string): void {
    if (this.debug) {
      console.log(`[${this.name}] ${message}`);
    }
  }
}
