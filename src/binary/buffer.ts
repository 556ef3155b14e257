import type { ByteMatcher, Signature } from '../types.js';

/**
 * Anything that can be matched byte-for-byte: a matcher signature or plain bytes
 */
export type BytePattern = Signature | Uint8Array | readonly number[];

/**
 * Test a single byte against a matcher (range bounds are inclusive)
 */
export function matchesByte(byte: number, matcher: ByteMatcher): boolean {
  return matcher.kind === 'exact'
    ? byte === matcher.value
    : byte >= matcher.lo && byte <= matcher.hi;
}

function matchesPatternByte(byte: number, pattern: BytePattern, index: number): boolean {
  const element = pattern[index];
  if (element === undefined) {
    return false;
  }
  return typeof element === 'number' ? byte === element : matchesByte(byte, element);
}

/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(data: Uint8Array, offset: number, pattern: BytePattern): boolean {
  if (offset < 0 || offset + pattern.length > data.length) {
    return false;
  }
  for (let i = 0; i < pattern.length; i++) {
    const byte = data[offset + i];
    if (byte === undefined || !matchesPatternByte(byte, pattern, i)) {
      return false;
    }
  }
  return true;
}

/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: BytePattern): boolean {
  return matchesAt(data, 0, pattern);
}

/**
 * Find a pattern in a Uint8Array, scanning forward one byte at a time
 */
export function indexOf(data: Uint8Array, pattern: BytePattern, startOffset = 0): number {
  const maxOffset = data.length - pattern.length;

  for (let i = Math.max(0, startOffset); i <= maxOffset; i++) {
    if (matchesAt(data, i, pattern)) {
      return i;
    }
  }
  return -1;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert a string to Uint8Array using ASCII encoding
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}
