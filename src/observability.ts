import { AsyncLocalStorage } from 'node:async_hooks';
import process from 'node:process';
import { inspect, stripVTControlCharacters } from 'node:util';

import { config, type LogLevel } from './config.js';

export type LogMetadata = Record<string, unknown>;

interface RunContext {
  readonly runId: string;
  readonly inputPath?: string;
}

const runContext = new AsyncLocalStorage<RunContext>({
  name: 'runContext',
});
let stderrAvailable = true;

process.stderr.on('error', () => {
  stderrAvailable = false;
});

const LEVEL_WEIGHTS: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function runWithRunContext<T>(context: RunContext, fn: () => T): T {
  return runContext.run(context, fn);
}

export function getRunId(): string | undefined {
  return runContext.getStore()?.runId;
}

function buildContextMetadata(): LogMetadata | undefined {
  const ctx = runContext.getStore();
  if (!ctx) return undefined;

  const meta: LogMetadata = { runId: ctx.runId };
  if (ctx.inputPath && config.logging.level === 'debug') {
    meta['inputPath'] = ctx.inputPath;
  }
  return meta;
}

function mergeMetadata(meta?: LogMetadata): LogMetadata | undefined {
  const contextMeta = buildContextMetadata();
  const hasMeta = meta && Object.keys(meta).length > 0;

  if (!contextMeta && !hasMeta) return undefined;
  if (!contextMeta) return meta;
  if (!hasMeta) return contextMeta;

  return { ...contextMeta, ...meta };
}

function formatMetadata(meta?: LogMetadata): string {
  const merged = mergeMetadata(meta);
  if (!merged) return '';

  return ` ${inspect(merged, { breakLength: Infinity, colors: false, compact: true, sorted: true })}`;
}

function createTimestamp(): string {
  return new Date().toISOString();
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  if (config.logging.format === 'json') {
    const merged = mergeMetadata(meta);
    const entry: Record<string, unknown> = {
      timestamp: createTimestamp(),
      level: level.toUpperCase(),
      message,
    };
    if (merged) {
      Object.assign(entry, merged);
    }
    return JSON.stringify(entry);
  }
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

function shouldLog(level: LogLevel): boolean {
  // warn and error are never filtered
  if (level === 'warn' || level === 'error') return true;
  return LEVEL_WEIGHTS[level] >= LEVEL_WEIGHTS[config.logging.level];
}

function safeWriteStderr(line: string): void {
  if (!stderrAvailable) return;
  if (process.stderr.destroyed || process.stderr.writableEnded) {
    stderrAvailable = false;
    return;
  }
  try {
    process.stderr.write(line);
  } catch {
    // EPIPE and friends: stop writing rather than crash the run.
    stderrAvailable = false;
  }
}

function writeLog(level: LogLevel, message: string, meta?: LogMetadata): void {
  if (!shouldLog(level)) return;

  const line = formatLogEntry(level, message, meta);
  safeWriteStderr(`${stripVTControlCharacters(line)}\n`);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  writeLog('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  writeLog('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  writeLog('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  writeLog('error', message, errorMeta);
}

/** Logs a resource that was found but could not be used. */
export function logSkippedResource(
  message: string,
  reason: string,
  meta?: LogMetadata
): void {
  writeLog('warn', message, { ...meta, skipped: true, reason });
}

export function redactUrl(rawUrl: string): string {
  try {
    const url = new URL(rawUrl);
    url.username = '';
    url.password = '';
    url.hash = '';
    url.search = '';
    return url.toString();
  } catch {
    return rawUrl;
  }
}

/** Shortens data URIs so payloads never end up in log lines. */
export function describeReference(reference: string): string {
  if (!reference.startsWith('data:')) return redactUrl(reference);
  const comma = reference.indexOf(',');
  if (comma === -1) return reference.slice(0, 40);
  return `${reference.slice(0, comma)},<${reference.length - comma - 1} chars>`;
}
