import { parseArgs } from 'node:util';

import { config } from './config.js';

export interface CliValues {
  readonly inputPath: string;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Refine a saved HTML page into index.html, styles/styles.css and images/',
  '',
  'Usage:',
  '  html-refiner <input.html> [--help|-h] [--version|-v]',
  '',
  'Options:',
  '  --help, -h    Show this help message.',
  '  --version, -v Show the version.',
  '',
  'Environment:',
  `  OUTPUT_DIR            Output directory (default: ${config.output.dir}).`,
  '  OUTPUT_MODE           readable | minified (default: readable).',
  '  EXTRACT_MAIN_CONTENT  Keep only the main content (default: false).',
  '  MAX_FILE_SIZE_MB, MAX_IMAGE_SIZE_MB, REQUEST_TIMEOUT,',
  '  IMAGE_FETCH_CONCURRENCY, USER_AGENT, LOG_LEVEL, LOG_FORMAT',
  '',
] as const;

const optionSchema = {
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values, positionals } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: true,
    });

    const help = values.help;
    const version = values.version;
    if (help || version) {
      return { ok: true, values: { inputPath: '', help, version } };
    }

    const [inputPath, ...extra] = positionals;
    if (inputPath === undefined) {
      return { ok: false, message: 'Missing input file' };
    }
    if (extra.length > 0) {
      return {
        ok: false,
        message: `Expected exactly one input file, got ${positionals.length}`,
      };
    }

    return { ok: true, values: { inputPath, help, version } };
  } catch (error: unknown) {
    return {
      ok: false,
      message: toErrorMessage(error),
    };
  }
}
