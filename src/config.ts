import { createRequire } from 'node:module';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import { config as loadDotenv } from 'dotenv';

loadDotenv();

const require = createRequire(import.meta.url);
const packageJsonPath = fileURLToPath(
  new URL('../package.json', import.meta.url)
);
const packageJson = require(packageJsonPath) as { version?: string };
if (typeof packageJson.version !== 'string') {
  throw new Error('package.json version is missing');
}

export const refinerVersion: string = packageJson.version;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type SerializationMode = 'readable' | 'minified';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const SERIALIZATION_MODES: readonly SerializationMode[] = [
  'readable',
  'minified',
];

const BYTES_PER_MB = 1024 * 1024;

const { env } = process;

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (!envValue) return defaultValue;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return defaultValue;
  if (min !== undefined && parsed < min) return defaultValue;
  if (max !== undefined && parsed > max) return defaultValue;
  return parsed;
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;
  const normalized = envValue.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return defaultValue;
}

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.trim().toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

const ALLOWED_MODES: ReadonlySet<string> = new Set(SERIALIZATION_MODES);

function isSerializationMode(value: string): value is SerializationMode {
  return ALLOWED_MODES.has(value);
}

export function parseSerializationMode(
  envValue: string | undefined
): SerializationMode {
  if (!envValue) return 'readable';
  const mode = envValue.trim().toLowerCase();
  return isSerializationMode(mode) ? mode : 'readable';
}

function parseDirectoryName(
  envValue: string | undefined,
  defaultValue: string
): string {
  const trimmed = envValue?.trim();
  return trimmed ? trimmed : defaultValue;
}

const DEFAULT_OUTPUT_DIR = 'componetes';
const DEFAULT_USER_AGENT = `html-refiner/${refinerVersion} (+image fetcher)`;

const maxFileSizeMb = parseInteger(env.MAX_FILE_SIZE_MB, 10, 1, 1024);
const maxImageSizeMb = parseInteger(env.MAX_IMAGE_SIZE_MB, 5, 1, 512);
const requestTimeoutSeconds = parseInteger(env.REQUEST_TIMEOUT, 10, 1, 300);

export const config = {
  app: {
    version: refinerVersion,
  },
  input: {
    maxFileBytes: maxFileSizeMb * BYTES_PER_MB,
    acceptedMimeTypes: ['text/html', 'text/plain', 'application/xhtml+xml'],
    sniffBytes: 4096,
  },
  fetcher: {
    timeoutMs: requestTimeoutSeconds * 1000,
    userAgent: env.USER_AGENT ?? DEFAULT_USER_AGENT,
    maxImageBytes: maxImageSizeMb * BYTES_PER_MB,
    concurrency: parseInteger(env.IMAGE_FETCH_CONCURRENCY, 4, 1, 10),
  },
  output: {
    dir: parseDirectoryName(env.OUTPUT_DIR, DEFAULT_OUTPUT_DIR),
    mode: parseSerializationMode(env.OUTPUT_MODE),
  },
  extraction: {
    extractMainContent: parseBoolean(env.EXTRACT_MAIN_CONTENT, false),
  },
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
} as const;
