/**
 * carveImages() — scan a container buffer for every supported image format
 * and extract the matched ranges.
 */

import { InvalidInputError } from '../errors.js';
import { extractAll } from '../extract.js';
import { scan } from '../scanner.js';
import { getSignatureEntry, getSupportedFormats } from '../signatures.js';
import type { CarveOptions, CarveResult, FormatCarveResult } from '../types.js';

/**
 * Normalize input to Uint8Array
 */
export function normalizeInput(input: Uint8Array | ArrayBuffer | string): Uint8Array {
  if (typeof input === 'string') {
    if (input.startsWith('data:')) {
      const commaIndex = input.indexOf(',');
      if (commaIndex === -1) {
        throw new InvalidInputError('Invalid data URL format');
      }
      let binaryString: string;
      try {
        binaryString = atob(input.slice(commaIndex + 1));
      } catch {
        throw new InvalidInputError('Invalid base64 in data URL');
      }
      const data = new Uint8Array(binaryString.length);
      for (let i = 0; i < binaryString.length; i++) {
        data[i] = binaryString.charCodeAt(i);
      }
      return data;
    }
    throw new InvalidInputError('String input must be a data URL');
  }
  if (input instanceof ArrayBuffer) {
    return new Uint8Array(input);
  }
  if (input instanceof Uint8Array) {
    return input;
  }
  throw new InvalidInputError();
}

/**
 * Find and extract embedded images.
 *
 * Formats are scanned independently over the full buffer and reported in
 * signature-table order (or the order given in `options.formats`, with
 * repeats dropped).
 */
export function carveImages(
  input: Uint8Array | ArrayBuffer | string,
  options: CarveOptions = {},
): CarveResult {
  const data = normalizeInput(input);
  const formats = [...new Set(options.formats ?? getSupportedFormats())];

  const results: FormatCarveResult[] = formats.map(format => {
    const entry = getSignatureEntry(format);
    const ranges = scan(data, entry);
    return {
      format,
      extension: entry.extension,
      ranges,
      images: extractAll(data, ranges),
    };
  });

  return { inputSize: data.length, formats: results };
}
