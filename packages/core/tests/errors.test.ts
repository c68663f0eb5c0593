import { describe, it, expect } from '@jest/globals';
import * as vm from 'vm';
import { ParseError, ScoutError, errorMessage, hasErrorCode } from '../src/errors.js';

function foreignError(message: string, code?: string): unknown {
  return vm.runInNewContext('const e = new Error(message); if (code) { e.code = code; } e', { message, code });
}

describe('errors', () => {
  describe('errorMessage', () => {
    it('reads the message of an error from another realm', () => {
      const error = foreignError('ENOENT: no such file or directory');

      expect(error instanceof Error).toBe(false);
      expect(errorMessage(error)).toBe('ENOENT: no such file or directory');
    });

    it('stringifies values that are not errors', () => {
      expect(errorMessage('plain text')).toBe('plain text');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('hasErrorCode', () => {
    it('matches the code of an error from another realm', () => {
      const error = foreignError('gone', 'ENOENT');

      expect(hasErrorCode(error, 'ENOENT')).toBe(true);
      expect(hasErrorCode(error, 'EACCES')).toBe(false);
    });

    it('is false for values without a code', () => {
      expect(hasErrorCode(new Error('no code'), 'ENOENT')).toBe(false);
      expect(hasErrorCode(null, 'ENOENT')).toBe(false);
    });
  });

  it('prefixes parse errors with their file and line', () => {
    const error = new ParseError('a.ts', "')' expected.", 3);

    expect(error).toBeInstanceOf(ScoutError);
    expect(errorMessage(error)).toBe("a.ts:3: ')' expected.");
  });
});
