/**
 * Output window
 *
 * The decoded output doubles as the back-reference dictionary: matches copy
 * from bytes already written here, never from the input.
 */

import { allocBufferUnsafe } from 'extract-base-iterator';
import { LzssError } from '../errors.ts';

// Initial allocation cap; the buffer doubles until it reaches the target size
const kInitialCapacity = 64 * 1024;

export class OutWindow {
  private buffer: Buffer;
  private pos: number;
  private size: number;

  constructor(size: number) {
    this.size = size;
    this.buffer = allocBufferUnsafe(Math.min(size, kInitialCapacity));
    this.pos = 0;
  }

  /**
   * Bytes written so far
   */
  getPosition(): number {
    return this.pos;
  }

  isFull(): boolean {
    return this.pos >= this.size;
  }

  putByte(b: number): void {
    if (this.pos >= this.buffer.length) this.grow();
    this.buffer[this.pos++] = b;
  }

  /**
   * Copy `length` bytes starting `distance` bytes back, one byte at a time so
   * overlapping runs repeat. Stops early once the target size is reached.
   *
   * @param inputOffset - input position of the token, for error reporting
   */
  copyMatch(distance: number, length: number, inputOffset: number): void {
    if (distance > this.pos) {
      throw new LzssError('InvalidBackReference', `Back-reference distance ${distance} exceeds output length ${this.pos}`, inputOffset);
    }
    let src = this.pos - distance;
    const count = Math.min(length, this.size - this.pos);
    for (let i = 0; i < count; i++) {
      this.putByte(this.buffer[src++]);
    }
  }

  /**
   * Decoded output; only valid once the window is full
   */
  toBuffer(): Buffer {
    return this.buffer.length === this.pos ? this.buffer : this.buffer.slice(0, this.pos);
  }

  private grow(): void {
    const capacity = Math.min(this.size, Math.max(1, this.buffer.length * 2));
    const next = allocBufferUnsafe(capacity);
    this.buffer.copy(next, 0, 0, this.pos);
    this.buffer = next;
  }
}
