import { describe, it, expect } from 'vitest';
import { Err, formatAppError } from '../../../src/errors/index.js';

describe('formatAppError', () => {
  it('lists config issues under the message', () => {
    const error = Err.configInvalid([{ path: 'SHELLWRAP_LOG_LEVEL', message: 'Invalid enum value' }]);
    expect(formatAppError(error)).toBe('Invalid configuration\n\n  - SHELLWRAP_LOG_LEVEL: Invalid enum value');
  });

  it('prints a placeholder when there are no issues', () => {
    expect(formatAppError(Err.configInvalid([]))).toBe('Invalid configuration\n\n  - (no details)');
  });

  it('prints lookup errors as their message', () => {
    expect(formatAppError(Err.shellNotFound('tcsh', ['bash', 'zsh']))).toBe(
      'Unknown shell "tcsh". Known shells: bash, zsh'
    );
    expect(formatAppError(Err.shellNotFound('tcsh', []))).toBe('Unknown shell "tcsh"');
    expect(formatAppError(Err.missingEnvironmentVariable('COMSPEC'))).toBe(
      'Required environment variable COMSPEC is not set'
    );
  });

  it('appends the filesystem code to I/O failures', () => {
    const cause = { code: 'FS_NOT_FOUND', message: 'Not found: /env/.tmp*' } as const;
    expect(formatAppError(Err.tempFileFailed('/env/.tmp', cause))).toBe(
      'Could not create wrapper script at /env/.tmp*: Not found: /env/.tmp* (FS_NOT_FOUND)'
    );
    expect(formatAppError(Err.digestFailed('/f', { code: 'FS_IO_ERROR', message: 'boom' }))).toBe(
      'Could not hash /f: boom (FS_IO_ERROR)'
    );
  });

  it('includes the cause of unexpected errors', () => {
    expect(formatAppError(Err.unexpected('Build crashed', new TypeError('bad')))).toBe(
      'Build crashed\nCause: TypeError: bad'
    );
    expect(formatAppError(Err.unexpected('Build crashed', { step: 2 }))).toBe('Build crashed\nCause: {"step":2}');
  });
});
