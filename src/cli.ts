/**
 * pdf-image-carve CLI — pull embedded JPEG and PNG images out of PDFs
 *
 * Features:
 *  • Single PDF or every PDF in a directory (optionally recursive)
 *  • Output root selection (default: ./results)
 *  • Format filter (jpeg, png)
 *  • Dry-run mode
 *  • JSON audit report
 */

import { readFileSync } from 'node:fs';
import { mkdir, stat, writeFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { dirname, join, resolve } from 'node:path';
import { UsageError } from './errors.js';
import { consoleLogger, silentLogger, type Logger } from './logger.js';
import { DEFAULT_OUT_DIR, isPdfPath } from './node.js';
import { carveDir, carveFiles, type BatchOptions } from './operations/batch.js';
import { isFormatSupported } from './signatures.js';
import type { BatchResult, ImageFormat } from './types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = join(__dirname, '..', 'package.json');
  const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version: string };
  return pkg.version;
}

// ─── Help text ────────────────────────────────────────────────────────────────

export const HELP = `
pdf-image-carve <file|dir> [options]

Extract embedded JPEG and PNG images from a PDF file or from every PDF in a directory.

  -o, --out-dir <dir>         Root directory for extracted images (default: "${DEFAULT_OUT_DIR}")
  -f, --formats <list>        Formats to extract, comma-separated (default: jpeg,png)
  -r, --recursive             Recurse into sub-directories
  --concurrency <N>           Max parallel files (default: 1)
  --dry-run                   Show what would be written, write nothing
  --report <file.json>        Write JSON audit report to file
  -q, --quiet                 Suppress progress output
  -h, --help                  Show this help
  -v, --version               Show version
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

export interface CliArgs {
  input?: string;
  outDir: string;
  formats?: ImageFormat[];
  recursive: boolean;
  concurrency: number;
  dryRun: boolean;
  report?: string;
  quiet: boolean;
}

function parseFormats(value: string): ImageFormat[] {
  const formats: ImageFormat[] = [];
  for (const name of value.split(',').map(s => s.trim().toLowerCase())) {
    if (!isFormatSupported(name)) {
      throw new UsageError(`--formats accepts only jpeg, png (got "${name}")`);
    }
    if (!formats.includes(name)) formats.push(name);
  }
  return formats;
}

export function parseArgs(raw: readonly string[]): CliArgs {
  const args: CliArgs = {
    outDir: DEFAULT_OUT_DIR,
    recursive: false,
    concurrency: 1,
    dryRun: false,
    quiet: false,
  };

  const take = (i: number, flag: string): [number, string] => {
    const val = raw[i + 1];
    if (val === undefined || val.startsWith('-')) {
      throw new UsageError(`${flag} requires a value`);
    }
    return [i + 1, val];
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i];
    if (a === undefined) continue;
    switch (a) {
      case '-r': case '--recursive':  args.recursive = true; break;
      case '-q': case '--quiet':      args.quiet = true; break;
      case '--dry-run':               args.dryRun = true; break;

      case '-o': case '--out-dir': {
        const [ni, v] = take(i, a); i = ni; args.outDir = v; break;
      }
      case '-f': case '--formats': {
        const [ni, v] = take(i, a); i = ni; args.formats = parseFormats(v); break;
      }
      case '--concurrency': {
        const [ni, v] = take(i, a); i = ni;
        const n = parseInt(v, 10);
        if (isNaN(n) || n < 1) {
          throw new UsageError('--concurrency must be a positive integer');
        }
        args.concurrency = n;
        break;
      }
      case '--report': {
        const [ni, v] = take(i, a); i = ni; args.report = v; break;
      }
      default:
        if (a.startsWith('-')) {
          throw new UsageError(`Unknown option: ${a}`);
        }
        if (args.input !== undefined) {
          throw new UsageError('Only one file or directory may be given');
        }
        args.input = a;
    }
  }

  return args;
}

// ─── Reporting ────────────────────────────────────────────────────────────────

function reportFailures(result: BatchResult, logger: Logger): boolean {
  for (const entry of result.failed) {
    logger.error(`✗ ${entry.file}: ${entry.error ?? 'unknown error'}`);
  }
  return result.failed.length > 0;
}

async function writeReport(reportPath: string, result: BatchResult): Promise<void> {
  const absPath = resolve(reportPath);
  await mkdir(dirname(absPath), { recursive: true });
  await writeFile(absPath, JSON.stringify(result.report, null, 2));
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the CLI against an argument vector and return the process exit code.
 */
export async function runCli(argv: readonly string[], logger: Logger = consoleLogger): Promise<number> {
  if (argv.length === 0 || argv.includes('-h') || argv.includes('--help')) {
    logger.info(HELP);
    return 0;
  }
  if (argv.includes('-v') || argv.includes('--version')) {
    logger.info(getVersion());
    return 0;
  }

  let a: CliArgs;
  try {
    a = parseArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      logger.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  if (a.input === undefined) {
    logger.error('Error: No input file or directory specified');
    return 1;
  }

  const options: BatchOptions = {
    outDir: a.outDir,
    concurrency: a.concurrency,
    dryRun: a.dryRun,
    logger: a.quiet ? silentLogger : logger,
    ...(a.formats !== undefined && { formats: a.formats }),
  };

  let kind: 'file' | 'dir';
  try {
    const s = await stat(a.input);
    kind = s.isDirectory() ? 'dir' : 'file';
  } catch {
    logger.warn('The provided path is neither a file nor a directory.');
    return 0;
  }

  let result: BatchResult;
  if (kind === 'dir') {
    result = await carveDir(a.input, options, a.recursive);
    if (!a.quiet) {
      logger.info(
        `Processed ${result.successful.length} PDF file(s), ` +
        `${result.report.totalImages} image(s) found`,
      );
    }
  } else {
    if (!isPdfPath(a.input)) {
      if (!a.quiet) logger.warn(`Skipping ${a.input}: not a .pdf file`);
      return 0;
    }
    result = await carveFiles([a.input], options);
  }

  const hasError = reportFailures(result, logger);

  if (a.report) {
    await writeReport(a.report, result);
    if (!a.quiet) logger.info(`Report written to ${a.report}`);
  }

  return hasError ? 1 : 0;
}
