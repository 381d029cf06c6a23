import { inspect } from 'node:util';

import { isError, isNonEmptyString, isObject } from './type-guards.js';

export type FetchRejectionReason =
  | 'http_status'
  | 'declared_size'
  | 'content_type'
  | 'streamed_size'
  | 'timeout'
  | 'network';

/** Why one remote image was rejected; `details` end up in the skip log. */
export class FetchError extends Error {
  readonly details: Readonly<Record<string, unknown>>;

  constructor(
    message: string,
    readonly url: string,
    readonly reason: FetchRejectionReason,
    details: Record<string, unknown> = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'FetchError';
    this.details = Object.freeze({ ...details });
    Error.captureStackTrace(this, this.constructor);
  }
}

export type InputValidationCode =
  | 'INPUT_NOT_FOUND'
  | 'INPUT_NOT_FILE'
  | 'INPUT_TOO_LARGE';

/** The input file cannot be processed at all; nothing has been written. */
export class InputValidationError extends Error {
  constructor(
    message: string,
    readonly code: InputValidationCode,
    readonly inputPath: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'InputValidationError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** `processHtmlFile` was called with options that do not match its schema. */
export class InvalidOptionsError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StageError extends Error {
  constructor(
    readonly stage: string,
    cause: unknown
  ) {
    super(`Stage ${stage} failed: ${getErrorMessage(cause)}`, { cause });
    this.name = 'StageError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}

export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  if (!isError(error)) return false;
  if (!('code' in error)) return false;
  return typeof error.code === 'string';
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isSystemError(error) && error.code === code;
}
