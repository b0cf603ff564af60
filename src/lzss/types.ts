/**
 * LZSS Types and Constants
 *
 * Shared types and constants for the Nintendo LZSS10/LZSS11 decoders.
 */

// Format tags (first header byte)
export const LZSS10_TAG = 0x10;
export const LZSS11_TAG = 0x11;

export type LzssFormat = 'lzss10' | 'lzss11';

// Header layout
export const kHeaderSize = 4;
export const kExtendedHeaderSize = 8;

// LZSS10 token constants
export const kLzss10MinMatch = 3;

// LZSS11 token constants
export const kLzss11MediumBias = 0x11;
export const kLzss11LongBias = 0x111;

// Back-reference distances are stored minus one
export const kDistanceBias = 1;
export const kDistanceMask = 0x0fff;

export const kFlagBits = 8;

/**
 * Parsed LZSS stream header
 */
export interface LzssHeader {
  format: LzssFormat;
  /** Declared decompressed size */
  size: number;
  /** Bytes consumed by the header (4, or 8 for the extended form) */
  headerSize: number;
}

/**
 * Decoded back-reference token
 *
 * `kind` records the token width: LZSS10 tokens are always 'short', LZSS11
 * picks 'short' (2 bytes), 'medium' (3 bytes) or 'long' (4 bytes). It is
 * informational for token-level callers; the copy only uses `length` and
 * `distance`.
 */
export interface BackReference {
  kind: 'short' | 'medium' | 'long';
  length: number;
  distance: number;
}

export interface LzssDecodeOptions {
  /** Reject headers declaring more output than this */
  maxOutputSize?: number;
  /** Require a specific variant */
  format?: LzssFormat;
}

/**
 * Map a format tag to its variant, or null when the tag is unknown
 */
export function formatFromTag(tag: number): LzssFormat | null {
  if (tag === LZSS10_TAG) return 'lzss10';
  if (tag === LZSS11_TAG) return 'lzss11';
  return null;
}
