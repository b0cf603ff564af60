/**
 * Hand-built LZSS streams shared across tests
 */

import assert from 'assert';
import { isLzssError, type LzssErrorCode } from '../../src/index.ts';

// "abcd" + back-reference (length 16, distance 4) => "abcd" x 5
export const LZSS10_ABCD = [0x10, 0x14, 0x00, 0x00, 0x08, 0x61, 0x62, 0x63, 0x64, 0xd0, 0x03];
export const LZSS11_ABCD = [0x11, 0x14, 0x00, 0x00, 0x08, 0x61, 0x62, 0x63, 0x64, 0xf0, 0x03];

// Headerless LZSS11 bodies exercising the 3-byte and 4-byte tokens
export const LZSS11_MEDIUM_BODY = [0x08, 0x61, 0x62, 0x63, 0x64, 0x01, 0x30, 0x03]; // 40 bytes
export const LZSS11_LONG_BODY = [0x08, 0x61, 0x62, 0x63, 0x64, 0x10, 0x07, 0xb0, 0x03]; // 400 bytes

/**
 * LZSS10 stream of literals only: a zero flag byte before every eight bytes
 */
export function literalLzss10(data: number[]): number[] {
  const stream = [0x10, data.length & 0xff, (data.length >> 8) & 0xff, (data.length >> 16) & 0xff];
  for (let i = 0; i < data.length; i += 8) stream.push(0x00, ...data.slice(i, i + 8));
  return stream;
}

export function abcd(times: number): string {
  return 'abcd'.repeat(times);
}

/**
 * Assert that fn throws an LzssError with the given code (and offset, when given)
 */
export function expectLzssError(fn: () => unknown, code: LzssErrorCode, offset?: number): void {
  assert.throws(fn, (err: unknown) => {
    if (!isLzssError(err)) throw err;
    assert.equal(err.code, code);
    if (offset !== undefined) assert.equal(err.offset, offset);
    return true;
  });
}
