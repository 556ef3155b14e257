/**
 * Signature table: start/end magic bytes for each carvable image format.
 *
 * Each signature is a frozen list of matchers. A matcher is either an exact
 * byte or an inclusive byte range, so the JPEG APPn marker family
 * (FF E0..FF EF) fits in one entry.
 */

import { InvalidSignatureError, UnsupportedFormatError } from './errors.js';
import type { ByteMatcher, ImageFormat, Signature, SignatureEntry } from './types.js';

function assertByte(value: number, position: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new InvalidSignatureError(`Byte value ${value} is outside 0x00..0xFF`, position);
  }
}

/**
 * Exact-byte matchers, one per argument
 */
export function exact(...bytes: number[]): ByteMatcher[] {
  return bytes.map((value): ByteMatcher => ({ kind: 'exact', value }));
}

/**
 * Inclusive byte-range matcher
 */
export function range(lo: number, hi: number): ByteMatcher {
  return { kind: 'range', lo, hi };
}

/**
 * Validate and freeze a signature.
 */
export function defineSignature(matchers: readonly ByteMatcher[]): Signature {
  if (matchers.length === 0) {
    throw new InvalidSignatureError('Signature must contain at least one matcher');
  }
  matchers.forEach((matcher, position) => {
    if (matcher.kind === 'exact') {
      assertByte(matcher.value, position);
      return;
    }
    assertByte(matcher.lo, position);
    assertByte(matcher.hi, position);
    if (matcher.lo > matcher.hi) {
      throw new InvalidSignatureError(
        `Range 0x${matcher.lo.toString(16)}..0x${matcher.hi.toString(16)} is empty`,
        position,
      );
    }
  });
  return Object.freeze(matchers.map(matcher => Object.freeze({ ...matcher })));
}

// ─── Table ────────────────────────────────────────────────────────────────────

const JPEG: SignatureEntry = Object.freeze({
  format: 'jpeg',
  extension: 'jpg',
  mimeType: 'image/jpeg',
  // SOI followed by an APP0..APP15 marker
  start: defineSignature([...exact(0xff, 0xd8, 0xff), range(0xe0, 0xef)]),
  // EOI
  end: defineSignature(exact(0xff, 0xd9)),
});

const PNG: SignatureEntry = Object.freeze({
  format: 'png',
  extension: 'png',
  mimeType: 'image/png',
  start: defineSignature(exact(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a)),
  // "IEND" chunk type plus its CRC
  end: defineSignature(exact(0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82)),
});

export const SIGNATURE_TABLE: Readonly<Record<ImageFormat, SignatureEntry>> = Object.freeze({
  jpeg: JPEG,
  png: PNG,
});

const FORMAT_ORDER: readonly ImageFormat[] = Object.freeze(['jpeg', 'png']);

/**
 * Get the list of supported formats, in scan order
 */
export function getSupportedFormats(): ImageFormat[] {
  return [...FORMAT_ORDER];
}

/**
 * Check if a format name has a signature table entry
 */
export function isFormatSupported(format: string): format is ImageFormat {
  return FORMAT_ORDER.some(f => f === format);
}

export function getSignatureEntry(format: string): SignatureEntry {
  if (!isFormatSupported(format)) {
    throw new UnsupportedFormatError(format);
  }
  return SIGNATURE_TABLE[format];
}
