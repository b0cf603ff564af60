/**
 * Forward-only byte reader
 *
 * Reads from a Buffer, Uint8Array or BufferList. Position only moves forward;
 * reading past the end raises UnexpectedEof.
 */

import type { BufferLike } from 'extract-base-iterator';
import { LzssError } from '../errors.ts';

/** Any input the decoders accept */
export type LzssInput = BufferLike | Uint8Array;

/**
 * Normalize a Uint8Array to a Buffer view (no copy); BufferList passes through.
 * Only for short random reads such as headers: BufferList.readByte walks the
 * chunk list on every call.
 */
export function toBufferLike(input: LzssInput): BufferLike {
  if (input instanceof Uint8Array) {
    return Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);
  }
  return input;
}

/**
 * Contiguous view of any input; a BufferList is joined once
 */
export function toBuffer(input: LzssInput): Buffer {
  const source = toBufferLike(input);
  return Buffer.isBuffer(source) ? source : source.toBuffer();
}

export class ByteReader {
  private input: Buffer;
  private pos: number;

  constructor(input: LzssInput, offset = 0) {
    this.input = toBuffer(input);
    this.pos = offset;
  }

  /**
   * Current input position
   */
  getPosition(): number {
    return this.pos;
  }

  readByte(): number {
    if (this.pos >= this.input.length) {
      throw new LzssError('UnexpectedEof', `Unexpected end of input at offset ${this.pos}`, this.pos);
    }
    return this.input[this.pos++];
  }

  /**
   * Read an unsigned little-endian integer of `width` bytes (at most 4)
   */
  readUIntLE(width: number): number {
    let value = 0;
    for (let i = 0; i < width; i++) {
      value |= this.readByte() << (i * 8);
    }
    return value >>> 0;
  }
}
