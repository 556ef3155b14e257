/**
 * Image formats with an entry in the signature table
 */
export type ImageFormat = 'jpeg' | 'png';

/**
 * One position of a signature: an exact byte or an inclusive byte range
 */
export type ByteMatcher =
  | { readonly kind: 'exact'; readonly value: number }
  | { readonly kind: 'range'; readonly lo: number; readonly hi: number };

/**
 * Ordered, non-empty sequence of matchers
 */
export type Signature = readonly ByteMatcher[];

/**
 * Start and end markers that bound one embedded image
 */
export interface SignaturePair {
  readonly start: Signature;
  readonly end: Signature;
}

export interface SignatureEntry extends SignaturePair {
  readonly format: ImageFormat;
  /** File extension used for carved output, without the dot */
  readonly extension: string;
  readonly mimeType: string;
}

/**
 * Half-open byte interval [start, end) in the scanned buffer
 */
export interface ImageRange {
  readonly start: number;
  /** One past the last byte of the end signature, or the buffer length */
  readonly end: number;
  /** True when no end signature followed and the range runs to end-of-buffer */
  readonly truncated: boolean;
}

/**
 * Ranges in the order found; start offsets strictly increase and never overlap
 */
export type ScanResult = readonly ImageRange[];

/**
 * Options for carveImages()
 */
export interface CarveOptions {
  /** Formats to scan for (default: every supported format, in table order) */
  formats?: readonly ImageFormat[];
}

export interface FormatCarveResult {
  format: ImageFormat;
  extension: string;
  ranges: ScanResult;
  /** Raw bytes of each range, same order as `ranges` */
  images: Uint8Array[];
}

export interface CarveResult {
  inputSize: number;
  formats: FormatCarveResult[];
}

/**
 * One image written (or planned, in dry-run mode) by the file layer
 */
export interface WrittenImage {
  format: ImageFormat;
  /** 1-based position within its format */
  index: number;
  path: string;
  size: number;
  range: ImageRange;
}

export interface CarveFileResult {
  inputPath: string;
  outputDir: string;
  inputSize: number;
  images: WrittenImage[];
  dryRun: boolean;
}

/**
 * Per-file entry in an audit report
 */
export interface AuditEntry {
  file: string;
  success: boolean;
  skipped: boolean;
  dryRun: boolean;
  inputSize?: number;
  outputDir?: string;
  images?: number;
  bytesWritten?: number;
  error?: string;
}

export interface AuditReport {
  timestamp: string;
  totalFiles: number;
  successful: number;
  failed: number;
  skipped: number;
  totalImages: number;
  totalBytesWritten: number;
  entries: AuditEntry[];
}

export interface BatchResult {
  successful: AuditEntry[];
  failed: AuditEntry[];
  skipped: AuditEntry[];
  report: AuditReport;
}
