/**
 * LZSS Header Parser
 *
 * Shared parsing logic for the stream header.
 * Used by both synchronous and streaming decoders.
 *
 * Header layout (little endian):
 * byte 0       = format tag (0x10 LZSS10, 0x11 LZSS11)
 * bytes 1-3    = decompressed size (24-bit)
 * bytes 4-7    = decompressed size (32-bit), only present when bytes 1-3 are zero
 */

import { LzssError } from '../errors.ts';
import { ByteReader, type LzssInput, toBufferLike } from '../sync/ByteReader.ts';
import { formatFromTag, kExtendedHeaderSize, kHeaderSize, type LzssHeader } from '../types.ts';

/**
 * Result of an incremental parse attempt
 */
export type HeaderParseResult = { success: true; header: LzssHeader } | { success: false; needBytes: number };

function invalidTag(tag: number, offset: number): LzssError {
  return new LzssError('InvalidHeader', `Invalid LZSS header: unknown format tag 0x${tag.toString(16)}`, offset);
}

/**
 * Parse a header from a possibly incomplete input
 *
 * Reports an unknown format tag as soon as the first byte is available.
 *
 * @param input - Input buffer or BufferList
 * @param offset - Offset of the format tag
 * @returns Parsed header or number of bytes needed
 */
export function parseLzssHeader(input: LzssInput, offset = 0): HeaderParseResult {
  const source = toBufferLike(input);
  const getByte = Buffer.isBuffer(source) ? (at: number) => source[at] : (at: number) => source.readByte(at);
  const available = source.length - offset;

  if (available < 1) {
    return { success: false, needBytes: kHeaderSize };
  }

  const tag = getByte(offset);
  const format = formatFromTag(tag);
  if (format === null) throw invalidTag(tag, offset);

  if (available < kHeaderSize) {
    return { success: false, needBytes: kHeaderSize - available };
  }

  const size = getByte(offset + 1) | (getByte(offset + 2) << 8) | (getByte(offset + 3) << 16);
  if (size !== 0) {
    return { success: true, header: { format, size, headerSize: kHeaderSize } };
  }

  // Extended form: the real size follows as 32-bit
  if (available < kExtendedHeaderSize) {
    return { success: false, needBytes: kExtendedHeaderSize - available };
  }

  const extended = (getByte(offset + 4) | (getByte(offset + 5) << 8) | (getByte(offset + 6) << 16) | (getByte(offset + 7) << 24)) >>> 0;
  return { success: true, header: { format, size: extended, headerSize: kExtendedHeaderSize } };
}

/**
 * Consume a header from a reader, throwing on invalid or truncated input
 */
export function readHeader(reader: ByteReader): LzssHeader {
  const start = reader.getPosition();
  const tag = reader.readByte();
  const format = formatFromTag(tag);
  if (format === null) throw invalidTag(tag, start);

  const size = reader.readUIntLE(3);
  if (size !== 0) {
    return { format, size, headerSize: kHeaderSize };
  }
  return { format, size: reader.readUIntLE(4), headerSize: kExtendedHeaderSize };
}

/**
 * Read the header of a complete stream
 */
export function readLzssHeader(input: LzssInput): LzssHeader {
  return readHeader(new ByteReader(input));
}

/**
 * Declared decompressed size, read from the header without decoding
 */
export function lzssDecodedSize(input: LzssInput): number {
  return readLzssHeader(input).size;
}
