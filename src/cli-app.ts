import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { detect, matchExtension, matchMime } from './detect.js';
import { BytesniffError } from './errors.js';
import type { FileFormat } from './format.js';
import { readFilePrefix, readPrefix, type ByteSource } from './node.js';
import { depth } from './traverse.js';
import { allFormats } from './tree.js';
import type { DetectionReport } from './types.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function getVersion(): string {
  const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

function withExtension(format: FileFormat): string {
  return format.extension ? `${format.mime} (${format.extension})` : format.mime;
}

function describeFormat(format: FileFormat): string {
  return `${withExtension(format)} [${format.kind.toString()}]`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Help text ────────────────────────────────────────────────────────────────

const HELP = `
bytesniff <file...> [options]

Identify file formats from their leading bytes.

OPTIONS
  --json                      Print one JSON object per input
  --mime <type>               Check inputs against a format; exit 1 on mismatch
  --ext <extension>           Check inputs against an extension; exit 1 on mismatch
  --list                      Print the built-in format tree
  -q, --quiet                 Suppress output, report through the exit code
  -h, --help                  Show this help
  -v, --version               Show version

STDIN
  Pass '-' as file argument to read from stdin.
  Example:  cat upload.bin | bytesniff -
`.trim();

// ─── Argument parser ──────────────────────────────────────────────────────────

interface CliArgs {
  files: string[];
  json: boolean;
  list: boolean;
  quiet: boolean;
  mime?: string;
  ext?: string;
}

export function parseArgs(raw: string[]): CliArgs {
  const args: CliArgs = { files: [], json: false, list: false, quiet: false };

  const take = (i: number, flag: string): string => {
    const val = raw[i + 1];
    if (val === undefined || (val.startsWith('-') && val !== '-')) {
      throw new BytesniffError(`${flag} requires a value`);
    }
    return val;
  };

  for (let i = 0; i < raw.length; i++) {
    const a = raw[i] ?? '';
    switch (a) {
      case '--json':              args.json = true; break;
      case '--list':              args.list = true; break;
      case '-q': case '--quiet':  args.quiet = true; break;

      case '--mime':
        args.mime = take(i, a); i++; break;
      case '--ext':
        args.ext = take(i, a); i++; break;

      default:
        if (a.startsWith('-') && a !== '-') {
          throw new BytesniffError(`Unknown option: ${a}`);
        }
        args.files.push(a);
    }
  }

  return args;
}

// ─── Commands ─────────────────────────────────────────────────────────────────

function printTree(): void {
  for (const format of allFormats()) {
    console.log(`${'  '.repeat(depth(format))}${withExtension(format)}`);
  }
}

function checkMatch(data: Uint8Array, args: CliArgs): boolean | undefined {
  if (args.mime === undefined && args.ext === undefined) {
    return undefined;
  }
  const mimeOk = args.mime === undefined || matchMime(data, args.mime);
  const extOk = args.ext === undefined || matchExtension(data, args.ext);
  return mimeOk && extOk;
}

function printResult(report: DetectionReport, format: FileFormat, args: CliArgs): void {
  if (args.json) {
    console.log(JSON.stringify(report));
    return;
  }
  const line = `${report.source}: ${describeFormat(format)}`;
  if (report.matched === undefined) {
    console.log(line);
  } else {
    const expected = [args.mime, args.ext].filter((v) => v !== undefined).join(', ');
    console.log(report.matched ? `✓ ${line}` : `✗ ${line}, expected ${expected}`);
  }
}

export interface CliIo {
  /** Source for the `-` argument (default: `process.stdin`) */
  stdin?: ByteSource;
}

// ─── Main ─────────────────────────────────────────────────────────────────────

/**
 * Run the command line and resolve to the process exit code
 */
export async function runCli(rawArgs: string[], io: CliIo = {}): Promise<number> {
  if (rawArgs.length === 0 || rawArgs.includes('-h') || rawArgs.includes('--help')) {
    console.log(HELP);
    return 0;
  }
  if (rawArgs.includes('-v') || rawArgs.includes('--version')) {
    console.log(getVersion());
    return 0;
  }

  let args: CliArgs;
  try {
    args = parseArgs(rawArgs);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    return 1;
  }

  if (args.list) {
    printTree();
    return 0;
  }

  if (args.files.length === 0) {
    console.error('Error: No input files specified');
    return 1;
  }

  let hasError = false;
  for (const file of args.files) {
    let data: Uint8Array;
    try {
      data =
        file === '-'
          ? await readPrefix(io.stdin ?? process.stdin, { label: 'stdin' })
          : await readFilePrefix(file);
    } catch (err) {
      hasError = true;
      console.error(`✗ ${file}: ${errorMessage(err)}`);
      continue;
    }

    const format = detect(data);
    const matched = checkMatch(data, args);
    const report: DetectionReport = {
      source: file,
      mime: format.mime,
      extension: format.extension,
      kind: format.kind.toString(),
      ...(matched !== undefined && { matched }),
    };
    if (matched === false) {
      hasError = true;
    }
    if (!args.quiet) {
      printResult(report, format, args);
    }
  }

  return hasError ? 1 : 0;
}
