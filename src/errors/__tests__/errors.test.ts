/**
 * Tests for the error handling system
 */

import { describe, it, expect } from 'vitest';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  describeError,
  formatError,
  getExitCode,
  toError,
} from '../index.js';

describe('Error Classes', () => {
  describe('CLIError', () => {
    it('creates error with message only', () => {
      const error = new CLIError('Something went wrong');

      expect(error.message).toBe('Something went wrong');
      expect(error.hint).toBeUndefined();
      expect(error.code).toBe(1);
      expect(error.name).toBe('CLIError');
    });

    it('creates error with custom exit code', () => {
      const error = new CLIError('Critical failure', 'Reboot', 99);

      expect(error.hint).toBe('Reboot');
      expect(error.code).toBe(99);
    });

    it('is instanceof Error', () => {
      const error = new CLIError('test');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('FileNotFoundError', () => {
    it('creates error with path', () => {
      const error = new FileNotFoundError('/path/to/docs');

      expect(error.message).toBe('Path does not exist: /path/to/docs');
      expect(error.code).toBe(3);
      expect(error).toBeInstanceOf(CLIError);
    });
  });

  describe('ConfigError', () => {
    it('creates error with default hint', () => {
      const error = new ConfigError('overlap must be smaller than chunk_size');

      expect(error.hint).toBe('Run: kbi config list  to see valid options');
      expect(error.code).toBe(2);
      expect(error.name).toBe('ConfigError');
    });

    it('creates error with custom hint', () => {
      const error = new ConfigError('Invalid option', 'Custom hint');

      expect(error.hint).toBe('Custom hint');
    });
  });

  describe('APIKeyError', () => {
    it('names the environment variable in the hint', () => {
      const error = new APIKeyError('Generative Language', 'GENAI_API_KEY');

      expect(error.message).toBe('Generative Language API key not configured');
      expect(error.hint).toBe(
        'Set the GENAI_API_KEY environment variable (or add it to a .env file)'
      );
      expect(error.envVar).toBe('GENAI_API_KEY');
      expect(error.code).toBe(4);
    });
  });

  describe('DatabaseError', () => {
    it('stores cause error', () => {
      const cause = new Error('SQLITE_BUSY');
      const error = new DatabaseError('Database locked', cause);

      expect(error.cause).toBe(cause);
      expect(error.code).toBe(5);
      expect(error.hint).toBe('Try running: kbi status  to check the chunk store');
    });
  });

  describe('ValidationError', () => {
    it('lists issues in the hint', () => {
      const error = new ValidationError('Invalid input', [
        'chunking.overlap: too large',
        'rate_limit.rps: must be positive',
      ]);

      expect(error.hint).toBe(
        'Issues:\n  chunking.overlap: too large\n  rate_limit.rps: must be positive'
      );
      expect(error.issues).toHaveLength(2);
    });

    it('uses a generic hint without issues', () => {
      const error = new ValidationError('Invalid input');

      expect(error.hint).toBe('Check your input and try again');
      expect(error.issues).toHaveLength(0);
    });
  });
});

describe('formatError', () => {
  describe('text output', () => {
    it('formats CLIError with hint', () => {
      const output = formatError(new CLIError('Failed', 'Try again'));

      expect(output).toContain('Failed');
      expect(output).toContain('Hint:');
      expect(output).toContain('Try again');
    });

    it('formats CLIError without hint', () => {
      const output = formatError(new CLIError('Failed'));

      expect(output).toContain('Failed');
      expect(output).not.toContain('Hint:');
    });

    it('suggests --verbose for plain errors', () => {
      const output = formatError(new Error('Something broke'));

      expect(output).toContain('Something broke');
      expect(output).toContain('--verbose');
    });

    it('shows stack trace in verbose mode', () => {
      const output = formatError(new CLIError('Failed', 'Try again'), { verbose: true });

      expect(output).toContain('Stack trace:');
    });

    it('formats unknown error types', () => {
      expect(formatError('string error')).toContain('string error');
    });

    it('shows the wrapped cause of a DatabaseError', () => {
      const output = formatError(new DatabaseError('Cannot open chunk store: kb.db', new Error('file is not a database')));

      expect(output.split('\n')).toEqual([
        'Error: Cannot open chunk store: kb.db',
        'Caused by: file is not a database',
        'Hint: Try running: kbi status  to check the chunk store',
      ]);
    });
  });

  describe('JSON output', () => {
    it('formats CLIError as JSON', () => {
      const output = formatError(new ConfigError('Bad config', 'Fix it'), { json: true });

      expect(JSON.parse(output)).toEqual({ error: 'Bad config', code: 2, hint: 'Fix it' });
    });

    it('includes stack in JSON verbose mode', () => {
      const parsed = JSON.parse(formatError(new CLIError('Failed'), { json: true, verbose: true }));

      expect(parsed.stack).toContain('CLIError');
    });

    it('lists validation issues in JSON', () => {
      const output = formatError(new ValidationError('Invalid embedding artifact: out.json', ['count: too small']), {
        json: true,
      });

      expect(JSON.parse(output)).toEqual({
        error: 'Invalid embedding artifact: out.json',
        code: 1,
        hint: 'Issues:\n  count: too small',
        issues: ['count: too small'],
      });
    });

    it('formats unknown error as JSON', () => {
      expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
    });
  });
});

describe('describeError', () => {
  it('keeps only the message and code of a plain Error', () => {
    expect(describeError(new Error('boom'))).toEqual({ error: 'boom', code: 1 });
  });

  it('adds the stack when verbose', () => {
    expect(describeError(new CLIError('Failed'), true).stack).toContain('CLIError');
  });
});

describe('getExitCode', () => {
  it('returns code from CLIError subclasses', () => {
    expect(getExitCode(new CLIError('test', undefined, 42))).toBe(42);
    expect(getExitCode(new FileNotFoundError('/x'))).toBe(3);
    expect(getExitCode(new ConfigError('bad'))).toBe(2);
    expect(getExitCode(new APIKeyError('Generative Language', 'GENAI_API_KEY'))).toBe(4);
    expect(getExitCode(new DatabaseError('locked'))).toBe(5);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('test'))).toBe(1);
    expect(getExitCode('string')).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('toError', () => {
  it('passes Error instances through', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
  });

  it('wraps other values', () => {
    const error = toError('boom');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('boom');
  });
});
