/**
 * nds-lzss: Nintendo LZSS10/LZSS11 Decompression Library
 *
 * Pure TypeScript decoder for the LZ77-family formats used by GBA and
 * NDS ROM assets. Decode only.
 */

// ============================================================================
// High-Level APIs (Recommended)
// ============================================================================

// Async decoder - callback or Promise
export { decodeLzss, type LzssDecodeCallback } from './decode.ts';
// Synchronous decoder and Transform streams
export { createLzssDecoder, createRawLzssDecoder, decompress } from './lzss/index.ts';

// ============================================================================
// Low-Level APIs
// ============================================================================

// Headerless bodies (size stored out of band)
export { decodeLzss10, decodeLzss11, LzssDecoder } from './lzss/index.ts';
// Token-level access
export { ByteReader, readLzss10Token, readLzss11Token } from './lzss/index.ts';

// ============================================================================
// Supporting APIs
// ============================================================================

export {
  type BackReference,
  detectLzssFormat,
  type HeaderParseResult,
  isLzssError,
  LZSS10_TAG,
  LZSS11_TAG,
  LzssError,
  type LzssErrorCode,
  type LzssDecodeOptions,
  type LzssFormat,
  type LzssHeader,
  type LzssInput,
  lzssDecodedSize,
  parseLzssHeader,
  readLzssHeader,
} from './lzss/index.ts';

// Callback type used by async decoders
export type { DecodeCallback } from './decode.ts';
