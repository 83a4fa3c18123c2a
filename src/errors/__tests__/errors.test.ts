/**
 * Tests for error handling system
 *
 * Tests cover:
 * - Error class properties and exit codes
 * - Retryable classification
 * - Error formatting (text and JSON)
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  DatabaseError,
  ValidationError,
  TransientIOError,
  SinkRejectedError,
  isRetryable,
  toError,
  formatError,
  getExitCode,
} from '../index.js';

beforeAll(() => {
  chalk.level = 0;
});

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('keeps instanceof through subclasses', () => {
      const error = new ConfigError('bad');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
      expect(error).toBeInstanceOf(ConfigError);
    });
  });

  it.each([
    [new FileNotFoundError('/tmp/missing.jsonl'), 'FileNotFoundError', 3],
    [new ConfigError('bad value'), 'ConfigError', 2],
    [new DatabaseError('locked'), 'DatabaseError', 5],
    [new ValidationError('bad vector'), 'ValidationError', 1],
    [new TransientIOError('timeout'), 'TransientIOError', 7],
    [new SinkRejectedError('qdrant', 400, 'bad request'), 'SinkRejectedError', 8],
  ])('%s has name %s and exit code %i', (error, name, code) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(getExitCode(error)).toBe(code);
  });

  it('FileNotFoundError names the path', () => {
    expect(new FileNotFoundError('/data/a.jsonl').message).toBe('Path does not exist: /data/a.jsonl');
  });

  it('ConfigError falls back to the config list hint', () => {
    expect(new ConfigError('x').hint).toBe('Run: corpus-ingest config list  to see valid options');
    expect(new ConfigError('x', 'custom').hint).toBe('custom');
  });

  it('ValidationError lists its issues in the hint', () => {
    const error = new ValidationError('Vector dimension mismatch', ['a: dimension 3, expected 4', 'b: dimension 5, expected 4']);

    expect(error.issues).toEqual(['a: dimension 3, expected 4', 'b: dimension 5, expected 4']);
    expect(error.hint).toBe('Issues:\n  a: dimension 3, expected 4\n  b: dimension 5, expected 4');
  });

  it('TransientIOError carries status and cause', () => {
    const cause = new Error('ECONNRESET');
    const error = new TransientIOError('ollama request failed', { status: 503, cause });

    expect(error.status).toBe(503);
    expect(error.cause).toBe(cause);
  });

  it('SinkRejectedError formats sink, status and body', () => {
    expect(new SinkRejectedError('quickwit', 404, 'index not found').message).toBe(
      'quickwit rejected the request with status 404: index not found'
    );
    expect(new SinkRejectedError('quickwit', 400, '').message).toBe('quickwit rejected the request with status 400');
  });
});

describe('isRetryable', () => {
  it('is true only for TransientIOError', () => {
    expect(isRetryable(new TransientIOError('timeout'))).toBe(true);
    expect(isRetryable(new SinkRejectedError('qdrant', 400, ''))).toBe(false);
    expect(isRetryable(new ValidationError('bad'))).toBe(false);
    expect(isRetryable(new ConfigError('bad'))).toBe(false);
    expect(isRetryable(new Error('plain'))).toBe(false);
    expect(isRetryable('string')).toBe(false);
  });
});

describe('toError', () => {
  it('returns Error instances unchanged', () => {
    const error = new Error('same');
    expect(toError(error)).toBe(error);
  });

  it('wraps other values', () => {
    const error = toError('boom');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('boom');
  });
});

describe('formatError', () => {
  it('prints message and hint for CLIError', () => {
    const output = formatError(new ConfigError('Invalid configuration', 'Fix it'));

    expect(output).toBe('Error: Invalid configuration\nHint: Fix it');
  });

  it('suggests --verbose for unexpected errors', () => {
    const output = formatError(new Error('kaboom'));

    expect(output).toBe('Error: kaboom\nHint: Run with --verbose for more details');
  });

  it('adds the stack trace in verbose mode', () => {
    const error = new Error('kaboom');
    const output = formatError(error, { verbose: true });

    expect(output.split('\n')[0]).toBe('Error: kaboom');
    expect(output).toContain('Stack trace:');
  });

  it('formats non-Error values', () => {
    expect(formatError('just a string')).toBe('Error: just a string');
  });

  describe('JSON mode', () => {
    it('includes type, code and hint', () => {
      const parsed: unknown = JSON.parse(formatError(new ConfigError('bad', 'hint'), { json: true }));

      expect(parsed).toEqual({ error: 'bad', type: 'ConfigError', code: 2, hint: 'hint' });
    });

    it('includes the HTTP status of sink errors', () => {
      const parsed: unknown = JSON.parse(formatError(new SinkRejectedError('qdrant', 422, 'wrong size'), { json: true }));

      expect(parsed).toMatchObject({ type: 'SinkRejectedError', code: 8, status: 422 });
    });

    it('includes validation issues', () => {
      const parsed: unknown = JSON.parse(formatError(new ValidationError('bad', ['x']), { json: true }));

      expect(parsed).toMatchObject({ type: 'ValidationError', issues: ['x'] });
    });

    it('uses code 1 for plain errors', () => {
      const parsed: unknown = JSON.parse(formatError(new TypeError('nope'), { json: true }));

      expect(parsed).toEqual({ error: 'nope', type: 'TypeError', code: 1 });
    });
  });
});

describe('getExitCode', () => {
  it('returns 1 for non-CLI errors', () => {
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode(null)).toBe(1);
  });
});
