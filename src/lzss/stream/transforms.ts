/**
 * LZSS Transform Stream Wrappers
 *
 * LZSS has no chunk boundaries, so both streams buffer their input and decode
 * when it ends. The header-aware decoder validates the header as soon as it
 * is complete, so a wrong format tag or an oversized declaration fails
 * without waiting for the rest of the input.
 */

import { BufferList, Transform } from 'extract-base-iterator';
import type { Transform as TransformType } from 'stream';
import createBufferingDecoder from '../../utils/createBufferingDecoder.ts';
import { parseLzssHeader } from '../lib/HeaderParser.ts';
import { checkOutputSize, decodeLzss10, decodeLzss11, decompress } from '../sync/LzssDecoder.ts';
import type { LzssDecodeOptions, LzssFormat } from '../types.ts';

/**
 * Create a decoder Transform stream for complete LZSS streams (header + body)
 *
 * @param options - Same options as decompress()
 * @returns Transform stream that pushes the decoded buffer once input ends
 */
export function createLzssDecoder(options?: LzssDecodeOptions): TransformType {
  // Header bytes only; BufferList reads walk the chunk list
  const headerList = new BufferList();
  const chunks: Buffer[] = [];
  let headerChecked = false;

  const checkHeader = (): void => {
    const result = parseLzssHeader(headerList, 0);
    if (!result.success) return;
    const { header } = result;
    checkOutputSize(header.size, options, header.headerSize, header.format);
    headerChecked = true;
    headerList.clear();
  };

  return new Transform({
    transform(chunk: Buffer, _encoding: string, callback: (error?: Error | null) => void) {
      chunks.push(chunk);
      try {
        if (!headerChecked) {
          headerList.append(chunk);
          checkHeader();
        }
        callback();
      } catch (err) {
        callback(err as Error);
      }
    },

    flush(callback: (error?: Error | null) => void) {
      try {
        const output = decompress(Buffer.concat(chunks), options);
        chunks.length = 0;
        this.push(output);
        callback(null);
      } catch (err) {
        callback(err as Error);
      }
    },
  });
}

/**
 * Create a decoder Transform stream for a headerless body
 *
 * @param format - Token variant of the body
 * @param size - Decompressed size, stored out of band by the container
 */
export function createRawLzssDecoder(format: LzssFormat, size: number): TransformType {
  return createBufferingDecoder(format === 'lzss10' ? decodeLzss10 : decodeLzss11, size);
}
