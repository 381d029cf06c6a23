import { Buffer } from 'node:buffer';
import { open, stat } from 'node:fs/promises';
import path from 'node:path';

import { config } from './config.js';
import { InputValidationError, hasErrorCode } from './errors.js';
import { logDebug, logWarn } from './observability.js';

export type SniffedMimeType =
  | 'text/html'
  | 'application/xhtml+xml'
  | 'text/plain'
  | 'application/octet-stream';

export interface ValidatedInput {
  readonly inputPath: string;
  readonly size: number;
  readonly mimeType: SniffedMimeType;
}

const ACCEPTED_MIME_TYPES: ReadonlySet<string> = new Set<string>(
  config.input.acceptedMimeTypes
);

const REPLACEMENT_CHAR = '\ufffd';
const BINARY_INDICATOR_THRESHOLD = 0.1;
const XHTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';
const HTML_MARKERS =
  /<!doctype\s+html|<(?:html|head|body|div|p|span|script|style|title|meta|table|a)[\s>/]/i;

function hasBinaryIndicators(sample: string): boolean {
  if (sample.includes('\x00')) return true;
  let replacementCount = 0;
  for (const char of sample) {
    if (char === REPLACEMENT_CHAR) replacementCount++;
  }
  return replacementCount > sample.length * BINARY_INDICATOR_THRESHOLD;
}

/** Best-effort content sniff over the leading bytes of a file. */
export function sniffMimeType(head: Uint8Array): SniffedMimeType {
  if (head.byteLength === 0) return 'text/plain';

  const text = Buffer.from(head).toString('utf8');
  if (hasBinaryIndicators(text)) return 'application/octet-stream';

  const leading = text.replace(/^\ufeff/, '').trimStart();
  if (/^<\?xml/i.test(leading) && leading.includes(XHTML_NAMESPACE)) {
    return 'application/xhtml+xml';
  }
  return HTML_MARKERS.test(text) ? 'text/html' : 'text/plain';
}

async function readLeadingBytes(
  filePath: string,
  length: number
): Promise<Uint8Array> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

async function statInput(inputPath: string): Promise<{
  isFile: boolean;
  size: number;
}> {
  try {
    const stats = await stat(inputPath);
    return { isFile: stats.isFile(), size: stats.size };
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      throw new InputValidationError(
        `Input file not found: ${inputPath}`,
        'INPUT_NOT_FOUND',
        inputPath,
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Fails with `InputValidationError` when the input is missing, is not a
 * regular file or is larger than `maxBytes`. An unexpected content type only
 * produces a warning.
 */
export async function validateInputFile(
  inputPath: string,
  maxBytes: number = config.input.maxFileBytes
): Promise<ValidatedInput> {
  const resolved = path.resolve(inputPath);
  const { isFile, size } = await statInput(resolved);

  if (!isFile) {
    throw new InputValidationError(
      `Input is not a regular file: ${inputPath}`,
      'INPUT_NOT_FILE',
      inputPath
    );
  }

  if (size > maxBytes) {
    const sizeMb = (size / (1024 * 1024)).toFixed(2);
    throw new InputValidationError(
      `Input file too large: ${sizeMb}MB exceeds limit of ${maxBytes} bytes`,
      'INPUT_TOO_LARGE',
      inputPath
    );
  }

  const mimeType = sniffMimeType(
    await readLeadingBytes(resolved, config.input.sniffBytes)
  );
  if (!ACCEPTED_MIME_TYPES.has(mimeType)) {
    logWarn('Unexpected input content type, continuing', {
      inputPath,
      mimeType,
    });
  }

  logDebug('Input validated', { inputPath: resolved, size, mimeType });
  return { inputPath: resolved, size, mimeType };
}
