/**
 * Back-reference token decoding
 *
 * LZSS10 (2 bytes, big endian):
 *   AB CD -> length A + 3, distance BCD + 1
 *
 * LZSS11 dispatches on the high nibble of the first byte:
 *   A > 1:  AB CD       -> length A + 1,        distance BCD + 1
 *   A = 0:  0B CD EF    -> length BC + 0x11,    distance DEF + 1
 *   A = 1:  1B CD EF GH -> length BCDE + 0x111, distance FGH + 1
 */

import { type BackReference, kDistanceBias, kDistanceMask, kLzss10MinMatch, kLzss11LongBias, kLzss11MediumBias } from '../types.ts';
import type { ByteReader } from './ByteReader.ts';

export function readLzss10Token(reader: ByteReader): BackReference {
  const value = (reader.readByte() << 8) | reader.readByte();
  return {
    kind: 'short',
    length: (value >>> 12) + kLzss10MinMatch,
    distance: (value & kDistanceMask) + kDistanceBias,
  };
}

export function readLzss11Token(reader: ByteReader): BackReference {
  const b0 = reader.readByte();
  const indicator = b0 >>> 4;

  if (indicator === 0) {
    const b1 = reader.readByte();
    const b2 = reader.readByte();
    return {
      kind: 'medium',
      length: (((b0 & 0x0f) << 4) | (b1 >>> 4)) + kLzss11MediumBias,
      distance: (((b1 & 0x0f) << 8) | b2) + kDistanceBias,
    };
  }

  if (indicator === 1) {
    const b1 = reader.readByte();
    const b2 = reader.readByte();
    const b3 = reader.readByte();
    return {
      kind: 'long',
      length: (((b0 & 0x0f) << 12) | (b1 << 4) | (b2 >>> 4)) + kLzss11LongBias,
      distance: (((b2 & 0x0f) << 8) | b3) + kDistanceBias,
    };
  }

  const b1 = reader.readByte();
  return {
    kind: 'short',
    length: indicator + 1,
    distance: (((b0 & 0x0f) << 8) | b1) + kDistanceBias,
  };
}
