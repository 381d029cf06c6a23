import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { type CliValues, parseCliArgs, renderCliUsage } from '../src/cli.js';

function assertParseSuccess(args: readonly string[]): CliValues {
  const result = parseCliArgs(args);
  if (!result.ok)
    throw new Error(`Expected parse success, got: ${result.message}`);
  assert.equal(result.ok, true);
  return result.values;
}

function assertParseError(args: readonly string[]): string {
  const result = parseCliArgs(args);
  assert.equal(result.ok, false);
  if (result.ok) {
    throw new Error('Expected parse error but parsing succeeded');
  }
  return result.message;
}

describe('parseCliArgs', () => {
  it('takes the input file as the only positional argument', () => {
    assert.deepEqual(assertParseSuccess(['page.html']), {
      inputPath: 'page.html',
      help: false,
      version: false,
    });
  });

  it('parses short-form aliases without requiring an input', () => {
    assert.deepEqual(assertParseSuccess(['-h']), {
      inputPath: '',
      help: true,
      version: false,
    });
    assert.deepEqual(assertParseSuccess(['--version']), {
      inputPath: '',
      help: false,
      version: true,
    });
  });

  it('requires an input file', () => {
    assert.equal(assertParseError([]), 'Missing input file');
  });

  it('rejects more than one input file', () => {
    assert.equal(
      assertParseError(['a.html', 'b.html']),
      'Expected exactly one input file, got 2'
    );
  });

  it('rejects unknown options', () => {
    const message = assertParseError(['--unknown', 'a.html']);
    assert.match(message, /unknown option/i);
  });
});

describe('renderCliUsage', () => {
  it('shows the invocation and ends with a newline', () => {
    const usage = renderCliUsage();
    assert.ok(usage.includes('html-refiner <input.html> [--help|-h] [--version|-v]'));
    assert.ok(usage.endsWith('\n'));
  });
});
