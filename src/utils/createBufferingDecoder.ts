import { Transform } from 'extract-base-iterator';
import type { Transform as TransformType } from 'stream';

type DecodeFn = (input: Buffer, size: number) => Buffer;

/**
 * Helper to create a Transform stream from a synchronous decoder
 *
 * This buffers all input and applies the decoder when the stream ends.
 * Suitable for headerless bodies whose size is known up front.
 */
export default function createBufferingDecoder(decodeFn: DecodeFn, size: number): InstanceType<typeof TransformType> {
  const chunks: Buffer[] = [];

  return new Transform({
    transform: (chunk: Buffer, _encoding: string, callback: (err?: Error | null, data?: Buffer) => void) => {
      chunks.push(chunk);
      callback();
    },
    flush: function (this: InstanceType<typeof TransformType>, callback: (err?: Error | null) => void) {
      try {
        const output = decodeFn(Buffer.concat(chunks), size);
        this.push(output);
        callback();
      } catch (err) {
        callback(err as Error);
      }
    },
  });
}
