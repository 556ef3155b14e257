/**
 * Signature-pair scanner.
 *
 * Walks a buffer once, left to right. Every start-signature hit is paired
 * with the first end signature at or after it; the cursor then jumps past
 * the terminator, so no byte belongs to two ranges of the same scan. A start
 * with no terminator yields a range running to end-of-buffer and ends the
 * scan.
 */

import { indexOf, matchesAt } from './binary/buffer.js';
import { getSignatureEntry, getSupportedFormats } from './signatures.js';
import type { ImageFormat, ImageRange, ScanResult, SignaturePair } from './types.js';

/**
 * Find every [start, end) range bounded by `pair` in `buffer`.
 */
export function scan(buffer: Uint8Array, pair: SignaturePair): ScanResult {
  const ranges: ImageRange[] = [];
  const length = buffer.length;
  const lastStart = length - pair.start.length;

  let i = 0;
  while (i <= lastStart) {
    if (!matchesAt(buffer, i, pair.start)) {
      i++;
      continue;
    }

    const start = i;
    const endAt = indexOf(buffer, pair.end, start);
    if (endAt === -1) {
      ranges.push({ start, end: length, truncated: true });
      break;
    }

    const end = endAt + pair.end.length;
    ranges.push({ start, end, truncated: false });
    i = end;
  }

  return ranges;
}

/**
 * Scan using a format's signature table entry
 */
export function scanFormat(buffer: Uint8Array, format: ImageFormat): ScanResult {
  return scan(buffer, getSignatureEntry(format));
}

/**
 * Run each format's scan independently over the whole buffer.
 */
export function scanAll(
  buffer: Uint8Array,
  formats: readonly ImageFormat[] = getSupportedFormats(),
): Partial<Record<ImageFormat, ScanResult>> {
  const results: Partial<Record<ImageFormat, ScanResult>> = {};
  for (const format of formats) {
    results[format] = scan(buffer, getSignatureEntry(format));
  }
  return results;
}
