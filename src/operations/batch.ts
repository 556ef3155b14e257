/**
 * Batch / directory processing for Node.js environments.
 *
 * Provides carveDir() and carveFiles() which visit every file, carve the
 * PDFs among them, and return an AuditReport. Each file is isolated: a read
 * or write failure is recorded on its entry and the run continues.
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import {
  DEFAULT_OUT_DIR,
  carveFile,
  imageOutputDir,
  isPdfPath,
  type CarveFileOptions,
} from '../node.js';
import type { AuditEntry, AuditReport, BatchResult } from '../types.js';

export interface BatchOptions extends CarveFileOptions {
  /** Max files processed in parallel (default: 1, which keeps log lines in file order) */
  concurrency?: number;
}

// ─── File collection ──────────────────────────────────────────────────────────

/**
 * Collect every regular file under a directory, sorted by path.
 */
async function collectFiles(dir: string, recursive: boolean): Promise<string[]> {
  const results: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        results.push(...(await collectFiles(fullPath, recursive)));
      }
    } else if (entry.isFile()) {
      results.push(fullPath);
    }
  }

  return results.sort();
}

// ─── Single-file processor ────────────────────────────────────────────────────

async function processSingleFile(
  inputPath: string,
  options: BatchOptions,
  claimedBy: string | undefined,
): Promise<AuditEntry> {
  const entry: AuditEntry = {
    file: inputPath,
    success: false,
    skipped: false,
    dryRun: options.dryRun === true,
  };

  if (!isPdfPath(inputPath)) {
    entry.success = true;
    entry.skipped = true;
    return entry;
  }

  if (claimedBy !== undefined) {
    const outputDir = imageOutputDir(options.outDir ?? DEFAULT_OUT_DIR, inputPath);
    entry.error = `Output directory ${outputDir} is already used by ${claimedBy}`;
    return entry;
  }

  try {
    const result = await carveFile(inputPath, options);
    entry.inputSize = result.inputSize;
    entry.outputDir = result.outputDir;
    entry.images = result.images.length;
    entry.bytesWritten = result.dryRun
      ? 0
      : result.images.reduce((sum, image) => sum + image.size, 0);
    entry.success = true;
  } catch (err) {
    entry.error = err instanceof Error ? err.message : String(err);
    entry.success = false;
  }

  return entry;
}

// ─── Output collisions ────────────────────────────────────────────────────────

/**
 * Map each PDF whose output directory was already taken by an earlier file
 * in the list to that earlier file. Same-named PDFs in different
 * sub-directories would otherwise overwrite each other's images.
 */
function findOutputCollisions(filePaths: readonly string[], outDir: string): Map<string, string> {
  const owners = new Map<string, string>();
  const collisions = new Map<string, string>();

  for (const file of filePaths) {
    if (!isPdfPath(file)) continue;
    const dir = imageOutputDir(outDir, file);
    const owner = owners.get(dir);
    if (owner === undefined) {
      owners.set(dir, file);
    } else {
      collisions.set(file, owner);
    }
  }

  return collisions;
}

// ─── Concurrency helper ───────────────────────────────────────────────────────

async function runConcurrent<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<AuditEntry>,
): Promise<AuditEntry[]> {
  const results = new Array<AuditEntry>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await fn(item);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, worker));
  return results;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Carve every PDF in a directory. Other files are skipped without notice.
 *
 * @param dirPath    Path to the directory to scan.
 * @param options    Batch options (outDir, concurrency, dryRun, logger, …)
 * @param recursive  Recurse into sub-directories (default: false)
 */
export async function carveDir(
  dirPath: string,
  options: BatchOptions = {},
  recursive = false,
): Promise<BatchResult> {
  const files = await collectFiles(resolve(dirPath), recursive);
  return carveFiles(files, options);
}

/**
 * Carve an explicit list of file paths.
 *
 * A PDF whose output directory clashes with an earlier file in the list is
 * recorded as failed and left unprocessed.
 */
export async function carveFiles(
  filePaths: readonly string[],
  options: BatchOptions = {},
): Promise<BatchResult> {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const collisions = findOutputCollisions(filePaths, options.outDir ?? DEFAULT_OUT_DIR);
  const entries = await runConcurrent(filePaths, concurrency, file =>
    processSingleFile(file, options, collisions.get(file)),
  );

  const processed = entries.filter(e => !e.skipped);
  const successful = processed.filter(e => e.success);
  const failed = processed.filter(e => !e.success);
  const skipped = entries.filter(e => e.skipped);

  const report: AuditReport = {
    timestamp: new Date().toISOString(),
    totalFiles: entries.length,
    successful: successful.length,
    failed: failed.length,
    skipped: skipped.length,
    totalImages: successful.reduce((s, e) => s + (e.images ?? 0), 0),
    totalBytesWritten: successful.reduce((s, e) => s + (e.bytesWritten ?? 0), 0),
    entries,
  };

  return { successful, failed, skipped, report };
}
