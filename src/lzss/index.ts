/**
 * LZSS Decoder Module
 *
 * Provides both synchronous and streaming LZSS10/LZSS11 decoders.
 *
 * Synchronous API: Use when input is a complete Buffer or BufferList
 * Streaming API: Use with Transform streams when input arrives in chunks
 */

import { formatFromTag, type LzssFormat } from './types.ts';

export { isLzssError, LzssError, type LzssErrorCode } from './errors.ts';
export { type HeaderParseResult, lzssDecodedSize, parseLzssHeader, readLzssHeader } from './lib/HeaderParser.ts';
// Streaming decoders (Transform streams)
export { createLzssDecoder, createRawLzssDecoder } from './stream/transforms.ts';
export { ByteReader, type LzssInput } from './sync/ByteReader.ts';
// Synchronous decoders (for Buffer input)
export { decodeLzss10, decodeLzss11, decompress, LzssDecoder } from './sync/LzssDecoder.ts';
export { readLzss10Token, readLzss11Token } from './sync/tokens.ts';
// Type exports
export * from './types.ts';

/**
 * Detect the LZSS variant from the format tag
 *
 * Only the first byte is inspected; use readLzssHeader() for a full check.
 *
 * @param data - Compressed data to analyze
 * @returns 'lzss10', 'lzss11', or null for anything else
 */
export function detectLzssFormat(data: Uint8Array): LzssFormat | null {
  if (data.length === 0) return null;
  return formatFromTag(data[0]);
}
