import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { NotPdfError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { carveImages } from './operations/carve.js';
import type { CarveFileResult, CarveOptions, WrittenImage } from './types.js';

export const DEFAULT_OUT_DIR = 'results';

const PDF_EXTENSION = '.pdf';

export interface CarveFileOptions extends CarveOptions {
  /** Root directory for carved images (default: 'results') */
  outDir?: string;
  /** Compute output paths and log them, but write nothing */
  dryRun?: boolean;
  logger?: Logger;
}

/**
 * Whether the loader accepts this path. The extension check is case-sensitive.
 */
export function isPdfPath(filePath: string): boolean {
  return filePath.endsWith(PDF_EXTENSION);
}

/**
 * Read a PDF into memory, or return null when the path is not a .pdf file.
 */
export async function loadPdf(filePath: string): Promise<Uint8Array | null> {
  if (!isPdfPath(filePath)) {
    return null;
  }
  const fileData = await readFile(filePath);
  return new Uint8Array(fileData.buffer, fileData.byteOffset, fileData.byteLength);
}

/**
 * `<resultsDir>/<name>-pdf-images`
 */
export function imageOutputDir(resultsDir: string, inputPath: string): string {
  return join(resultsDir, `${basename(inputPath, PDF_EXTENSION)}-pdf-images`);
}

/**
 * `<resultsDir>/<name>-pdf-images/<name>-image-<index>.<extension>`
 */
export function imageOutputPath(
  resultsDir: string,
  inputPath: string,
  extension: string,
  index: number,
): string {
  const name = basename(inputPath, PDF_EXTENSION);
  return join(imageOutputDir(resultsDir, inputPath), `${name}-image-${index}.${extension}`);
}

/**
 * Carve every embedded image out of one PDF and write each to disk.
 *
 * Numbering restarts at 1 for each format, so `doc-image-1.jpg` and
 * `doc-image-1.png` can sit side by side.
 */
export async function carveFile(
  inputPath: string,
  options: CarveFileOptions = {},
): Promise<CarveFileResult> {
  const logger = options.logger ?? silentLogger;
  const dryRun = options.dryRun === true;
  const resultsDir = options.outDir ?? DEFAULT_OUT_DIR;

  const data = await loadPdf(inputPath);
  if (data === null) {
    throw new NotPdfError(inputPath);
  }

  const carved = carveImages(data, options);
  const outputDir = imageOutputDir(resultsDir, inputPath);
  const images: WrittenImage[] = [];

  for (const { format, extension, ranges, images: bytes } of carved.formats) {
    if (ranges.length === 0) {
      logger.info(`No ${extension} signature found in the file: ${inputPath}`);
      continue;
    }

    logger.info(`Starting to save ${extension} images from the file...`);
    if (!dryRun) {
      await mkdir(outputDir, { recursive: true });
    }

    for (let i = 0; i < ranges.length; i++) {
      const range = ranges[i];
      const imageData = bytes[i];
      if (range === undefined || imageData === undefined) continue;

      const index = i + 1;
      const path = imageOutputPath(resultsDir, inputPath, extension, index);
      if (dryRun) {
        logger.info(`(dry) ${path}`);
      } else {
        await writeFile(path, imageData);
        logger.info(`Image saved to ${path}`);
      }
      images.push({ format, index, path, size: imageData.length, range });
    }
  }

  return { inputPath, outputDir, inputSize: carved.inputSize, images, dryRun };
}
