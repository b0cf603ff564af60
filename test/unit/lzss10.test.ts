/**
 * LZSS10 decoder tests
 */

import assert from 'assert';
import { bufferFrom } from 'extract-base-iterator';
import { decodeLzss10, decompress, LzssDecoder } from '../../src/index.ts';
import { abcd, expectLzssError, LZSS10_ABCD } from '../lib/fixtures.ts';

describe('LZSS10 decoder', () => {
  describe('decompress', () => {
    it('should expand literals followed by a back-reference', () => {
      const output = decompress(bufferFrom(LZSS10_ABCD));
      assert.equal(output.length, 20);
      assert.equal(output.toString('latin1'), abcd(5));
    });

    it('should repeat a single byte for overlapping references', () => {
      // literal 'A', then token 0x2000: length 5, distance 1
      const output = decompress(bufferFrom([0x10, 0x06, 0x00, 0x00, 0x40, 0x41, 0x20, 0x00]));
      assert.deepEqual(Array.from(output), [0x41, 0x41, 0x41, 0x41, 0x41, 0x41]);
    });

    it('should read a new flag byte after eight tokens', () => {
      const output = decompress(bufferFrom([0x10, 0x09, 0x00, 0x00, 0x00, 1, 2, 3, 4, 5, 6, 7, 8, 0x00, 9]));
      assert.deepEqual(Array.from(output), [1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('should decode the extended length form', () => {
      const output = decompress(bufferFrom([0x10, 0x00, 0x00, 0x00, 0x05, 0x00, 0x00, 0x00, 0x00, 1, 2, 3, 4, 5]));
      assert.deepEqual(Array.from(output), [1, 2, 3, 4, 5]);
    });

    it('should truncate a back-reference at the declared size', () => {
      // token 0xF000 asks for 18 bytes but only 4 more fit; trailing 0x99 is never read
      const output = decompress(bufferFrom([0x10, 0x05, 0x00, 0x00, 0x40, 0x41, 0xf0, 0x00, 0x99]));
      assert.deepEqual(Array.from(output), [0x41, 0x41, 0x41, 0x41, 0x41]);
    });

    it('should reject a back-reference before the start of output', () => {
      expectLzssError(() => decompress(bufferFrom([0x10, 0x05, 0x00, 0x00, 0x80, 0x00, 0x00])), 'InvalidBackReference', 5);
    });

    it('should reject a truncated token', () => {
      expectLzssError(() => decompress(bufferFrom([0x10, 0x08, 0x00, 0x00, 0x08, 0x61, 0x62, 0x63, 0x64, 0xd0])), 'UnexpectedEof', 10);
    });

    it('should reject a missing flag byte', () => {
      expectLzssError(() => decompress(bufferFrom([0x10, 0x01, 0x00, 0x00])), 'UnexpectedEof', 4);
    });

    it('should reject a missing literal', () => {
      expectLzssError(() => decompress(bufferFrom([0x10, 0x02, 0x00, 0x00, 0x00, 0x61])), 'UnexpectedEof', 6);
    });
  });

  describe('decodeLzss10', () => {
    it('should decode an empty body without reading input', () => {
      assert.equal(decodeLzss10(bufferFrom([0x00]), 0).length, 0);
      assert.equal(decodeLzss10(bufferFrom([]), 0).length, 0);
    });

    it('should decode a literal-only body', () => {
      const output = decodeLzss10(bufferFrom([0x00, 0x61, 0x62, 0x63, 0x64, 0x65, 0x66, 0x67, 0x68]), 8);
      assert.equal(output.toString('latin1'), 'abcdefgh');
    });

    it('should decode a body with a back-reference', () => {
      const output = decodeLzss10(bufferFrom(LZSS10_ABCD.slice(4)), 20);
      assert.equal(output.toString('latin1'), abcd(5));
    });

    it('should reject negative and fractional sizes', () => {
      const body = bufferFrom(LZSS10_ABCD.slice(4));
      expectLzssError(() => decodeLzss10(body, -1), 'InvalidSize', 0);
      expectLzssError(() => decodeLzss10(body, 1.5), 'InvalidSize', 0);
      expectLzssError(() => decodeLzss10(body, Number.NaN), 'InvalidSize', 0);
    });
  });

  describe('LzssDecoder', () => {
    it('should stop mid flag byte once the size is reached', () => {
      // the remaining flag bits would mark 0xFF 0xFF as more literals
      const decoder = new LzssDecoder('lzss10', bufferFrom([0x00, 0x61, 0x62, 0xff, 0xff]));
      const output = decoder.decode(2);
      assert.equal(output.toString('latin1'), 'ab');
      assert.equal(decoder.getInputPosition(), 3);
    });

    it('should start at an input offset', () => {
      const decoder = new LzssDecoder('lzss10', bufferFrom(LZSS10_ABCD), 4);
      assert.equal(decoder.decode(20).toString('latin1'), abcd(5));
      assert.equal(decoder.getInputPosition(), LZSS10_ABCD.length);
    });
  });
});
