import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  FetchError,
  InputValidationError,
  InvalidOptionsError,
  StageError,
  getErrorMessage,
  hasErrorCode,
} from '../src/errors.js';

describe('FetchError', () => {
  it('carries the rejection reason and frozen details', () => {
    const error = new FetchError('too big', 'https://example.com/a.png', 'declared_size', {
      declared: 10,
    });

    assert.equal(error.name, 'FetchError');
    assert.equal(error.url, 'https://example.com/a.png');
    assert.equal(error.reason, 'declared_size');
    assert.deepEqual(error.details, { declared: 10 });
    assert.equal(Object.isFrozen(error.details), true);
  });

  it('defaults to empty details', () => {
    const error = new FetchError('offline', 'https://example.com', 'network');
    assert.deepEqual(error.details, {});
    assert.equal('statusCode' in error, false);
  });
});

describe('StageError', () => {
  it('names the stage and keeps the cause', () => {
    const cause = new Error('disk full');
    const error = new StageError('output', cause);

    assert.equal(error.message, 'Stage output failed: disk full');
    assert.equal(error.stage, 'output');
    assert.equal(error.cause, cause);
  });
});

describe('InputValidationError', () => {
  it('exposes the code and the offending path', () => {
    const error = new InputValidationError('missing', 'INPUT_NOT_FOUND', 'a.html');
    assert.equal(error.code, 'INPUT_NOT_FOUND');
    assert.equal(error.inputPath, 'a.html');
    assert.ok(error instanceof Error);
  });
});

describe('InvalidOptionsError', () => {
  it('joins the issues into its message', () => {
    const error = new InvalidOptionsError(['inputPath: Required', 'mode: Invalid']);
    assert.equal(error.message, 'Invalid options: inputPath: Required; mode: Invalid');
  });
});

describe('getErrorMessage', () => {
  it('normalizes unknown values', () => {
    assert.equal(getErrorMessage(new Error('boom')), 'boom');
    assert.equal(getErrorMessage('plain'), 'plain');
    assert.equal(getErrorMessage({ message: 'shaped' }), 'shaped');
    assert.equal(getErrorMessage(null), 'Unknown error');
    assert.equal(getErrorMessage(42), '42');
  });
});

describe('hasErrorCode', () => {
  it('matches system error codes only', () => {
    const error = Object.assign(new Error('exists'), { code: 'EEXIST' });
    assert.equal(hasErrorCode(error, 'EEXIST'), true);
    assert.equal(hasErrorCode(error, 'ENOENT'), false);
    assert.equal(hasErrorCode({ code: 'EEXIST' }, 'EEXIST'), false);
  });
});
