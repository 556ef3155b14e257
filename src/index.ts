/**
 * pdf-image-carve - embedded image extraction by signature scanning
 *
 * Find JPEG and PNG images inside PDF (or any binary) data by their
 * start/end magic bytes, without parsing the container.
 *
 * @packageDocumentation
 */

// Main API
export { carveImages, normalizeInput } from './operations/carve.js';
export { scan, scanFormat, scanAll } from './scanner.js';
export { extract, extractAll } from './extract.js';

// Signature table
export {
  SIGNATURE_TABLE,
  defineSignature,
  exact,
  range,
  getSignatureEntry,
  getSupportedFormats,
  isFormatSupported,
} from './signatures.js';

// Types
export type {
  ImageFormat,
  ByteMatcher,
  Signature,
  SignaturePair,
  SignatureEntry,
  ImageRange,
  ScanResult,
  CarveOptions,
  CarveResult,
  FormatCarveResult,
} from './types.js';

// Error classes
export {
  PdfCarveError,
  InvalidInputError,
  InvalidSignatureError,
  UnsupportedFormatError,
  NotPdfError,
  UsageError,
} from './errors.js';

// Binary utilities for advanced usage
export * as buffer from './binary/buffer.js';

// Default export for convenience
import { carveImages } from './operations/carve.js';
export default carveImages;
