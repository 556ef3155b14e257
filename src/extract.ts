import type { ImageRange, ScanResult } from './types.js';

/**
 * Copy the bytes of one range out of the buffer.
 *
 * The copy does not share memory with `buffer`, so callers can drop the
 * source as soon as extraction is done.
 */
export function extract(buffer: Uint8Array, range: ImageRange): Uint8Array {
  return buffer.slice(range.start, range.end);
}

/**
 * Extract every range, preserving scan order
 */
export function extractAll(buffer: Uint8Array, result: ScanResult): Uint8Array[] {
  return result.map(range => extract(buffer, range));
}
