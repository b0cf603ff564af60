/**
 * Synchronous LZSS10/LZSS11 Decoder
 *
 * Decodes Nintendo LZSS data from a buffer or BufferList.
 * All operations are synchronous.
 */

import { constants } from 'buffer';
import { LzssError } from '../errors.ts';
import { readHeader } from '../lib/HeaderParser.ts';
import { type BackReference, kFlagBits, type LzssDecodeOptions, type LzssFormat } from '../types.ts';
import { ByteReader, type LzssInput } from './ByteReader.ts';
import { OutWindow } from './OutWindow.ts';
import { readLzss10Token, readLzss11Token } from './tokens.ts';

/**
 * Flag-driven decode loop
 *
 * Holds the current flag byte and a bit cursor; a cursor of 8 means the next
 * step reads a fresh flag byte.
 */
export class LzssDecoder {
  private reader: ByteReader;
  private readToken: (reader: ByteReader) => BackReference;
  private flags: number;
  private bitIndex: number;

  constructor(format: LzssFormat, input: LzssInput | ByteReader, offset = 0) {
    this.reader = input instanceof ByteReader ? input : new ByteReader(input, offset);
    this.readToken = format === 'lzss10' ? readLzss10Token : readLzss11Token;
    this.flags = 0;
    this.bitIndex = kFlagBits;
  }

  /**
   * Input position after the last byte consumed
   */
  getInputPosition(): number {
    return this.reader.getPosition();
  }

  /**
   * Decode exactly `size` bytes. Stops as soon as the output is full, leaving
   * any remaining flag bits and input bytes unread.
   */
  decode(size: number): Buffer {
    const outWindow = new OutWindow(size);
    this.flags = 0;
    this.bitIndex = kFlagBits;

    while (!outWindow.isFull()) {
      if (this.bitIndex === kFlagBits) {
        this.flags = this.reader.readByte();
        this.bitIndex = 0;
      }

      const isMatch = (this.flags & (0x80 >>> this.bitIndex)) !== 0;
      this.bitIndex++;

      if (isMatch) {
        const tokenOffset = this.reader.getPosition();
        const { distance, length } = this.readToken(this.reader);
        outWindow.copyMatch(distance, length, tokenOffset);
      } else {
        outWindow.putByte(this.reader.readByte());
      }
    }

    return outWindow.toBuffer();
  }
}

/**
 * Reject a header or size the options or the platform do not allow
 *
 * @param offset - input position reported with the error
 */
export function checkOutputSize(size: number, options: LzssDecodeOptions | undefined, offset: number, format?: LzssFormat): void {
  if (format !== undefined && options?.format && options.format !== format) {
    throw new LzssError('InvalidHeader', `Expected ${options.format} data but found ${format}`, 0);
  }
  if (!Number.isInteger(size) || size < 0) {
    throw new LzssError('InvalidSize', `Output size must be a non-negative integer, got ${size}`, offset);
  }
  const maxOutputSize = options?.maxOutputSize;
  if (typeof maxOutputSize === 'number' && size > maxOutputSize) {
    throw new LzssError('OutputLimitExceeded', `Declared size ${size} exceeds limit ${maxOutputSize}`, offset);
  }
  if (size > constants.MAX_LENGTH) {
    throw new LzssError('OutputLimitExceeded', `Declared size ${size} cannot be allocated`, offset);
  }
}

/**
 * Decode a headerless LZSS10 body
 *
 * @param input - Compressed data starting at the first flag byte
 * @param size - Decompressed size
 */
export function decodeLzss10(input: LzssInput, size: number): Buffer {
  checkOutputSize(size, undefined, 0);
  return new LzssDecoder('lzss10', input).decode(size);
}

/**
 * Decode a headerless LZSS11 body
 *
 * @param input - Compressed data starting at the first flag byte
 * @param size - Decompressed size
 */
export function decodeLzss11(input: LzssInput, size: number): Buffer {
  checkOutputSize(size, undefined, 0);
  return new LzssDecoder('lzss11', input).decode(size);
}

/**
 * Decompress a complete LZSS stream (header + body)
 *
 * @returns Exactly the number of bytes the header declares
 * @throws LzssError
 */
export function decompress(input: LzssInput, options?: LzssDecodeOptions): Buffer {
  const reader = new ByteReader(input);
  const header = readHeader(reader);
  checkOutputSize(header.size, options, reader.getPosition(), header.format);

  return new LzssDecoder(header.format, reader).decode(header.size);
}
