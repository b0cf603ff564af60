/**
 * Asynchronous LZSS decoding
 *
 * Wraps the synchronous decoder in the callback-or-Promise contract: with a
 * callback the result arrives on a later tick, otherwise a Promise resolves
 * with the decoded data. Decode errors are LzssError values either way.
 */

import once from 'call-once-fn';
import type { LzssInput } from './lzss/sync/ByteReader.ts';
import { decompress } from './lzss/sync/LzssDecoder.ts';
import type { LzssDecodeOptions } from './lzss/types.ts';

export type DecodeCallback<T = Buffer> = (error: Error | null, result?: T) => void;

/** Callback invoked when an async LZSS decode completes */
export type LzssDecodeCallback = DecodeCallback<Buffer>;

export function decodeLzss(input: LzssInput, callback: LzssDecodeCallback): void;
export function decodeLzss(input: LzssInput, options: LzssDecodeOptions | undefined, callback: LzssDecodeCallback): void;
export function decodeLzss(input: LzssInput, options?: LzssDecodeOptions): Promise<Buffer>;
export function decodeLzss(input: LzssInput, options?: LzssDecodeOptions | LzssDecodeCallback, callback?: LzssDecodeCallback): Promise<Buffer> | void {
  if (typeof options === 'function') {
    callback = options;
    options = undefined;
  }
  const decodeOptions = options;

  if (typeof callback !== 'function') {
    return new Promise<Buffer>((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(decompress(input, decodeOptions));
        } catch (err) {
          reject(err);
        }
      });
    });
  }

  // Callback stays outside the try so its own throw is not reported as a decode error
  const done = once(callback);
  setImmediate(() => {
    let output: Buffer;
    try {
      output = decompress(input, decodeOptions);
    } catch (err) {
      done(err as Error);
      return;
    }
    done(null, output);
  });
}
