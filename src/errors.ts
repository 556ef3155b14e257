/**
 * Base error class for pdf-image-carve errors
 */
export class PdfCarveError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PdfCarveError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when library input is not bytes or a data URL
 */
export class InvalidInputError extends PdfCarveError {
  constructor(message = 'Input must be Uint8Array, ArrayBuffer, or data URL string') {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * Thrown when a signature definition is empty or holds an impossible matcher
 */
export class InvalidSignatureError extends PdfCarveError {
  public readonly position: number | undefined;

  constructor(message: string, position?: number) {
    super(position !== undefined ? `${message} at position ${position}` : message);
    this.name = 'InvalidSignatureError';
    this.position = position;
  }
}

/**
 * Thrown when an image format has no signature table entry
 */
export class UnsupportedFormatError extends PdfCarveError {
  public readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * Thrown when the loader declines a file without the .pdf extension
 */
export class NotPdfError extends PdfCarveError {
  public readonly path: string;

  constructor(path: string) {
    super(`Not a PDF file: ${path}`);
    this.name = 'NotPdfError';
    this.path = path;
  }
}

/**
 * Thrown for malformed command-line arguments
 */
export class UsageError extends PdfCarveError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
