import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../src/config/app-config.js';

describe('loadConfig', () => {
  it('defaults everything on an empty environment', () => {
    const config = loadConfig({ env: {}, platform: 'linux' })._unsafeUnwrap();

    expect(config.host).toEqual({ kind: 'posix', bsd: false });
    expect(config.activation).toEqual({ comspec: undefined, condaBat: undefined, condaExe: undefined });
    expect(config.logging.level).toBe('silent');
  });

  it('reads the activation overrides', () => {
    const config = loadConfig({
      env: { COMSPEC: 'C:\\Windows\\cmd.exe', CONDA_BAT: 'C:\\c\\conda.bat', CONDA_EXE: '/opt/c/bin/conda' },
      platform: 'win32',
    })._unsafeUnwrap();

    expect(config.host).toEqual({ kind: 'windows' });
    expect(config.activation).toEqual({
      comspec: 'C:\\Windows\\cmd.exe',
      condaBat: 'C:\\c\\conda.bat',
      condaExe: '/opt/c/bin/conda',
    });
  });

  it('treats blank overrides as unset', () => {
    const config = loadConfig({ env: { COMSPEC: '', CONDA_EXE: '   ' }, platform: 'linux' })._unsafeUnwrap();
    expect(config.activation.comspec).toBeUndefined();
    expect(config.activation.condaExe).toBeUndefined();
  });

  it('accepts log levels in any case', () => {
    const config = loadConfig({ env: { SHELLWRAP_LOG_LEVEL: 'DEBUG' }, platform: 'linux' })._unsafeUnwrap();
    expect(config.logging.level).toBe('debug');
  });

  it('rejects unknown log levels', () => {
    const error = loadConfig({ env: { SHELLWRAP_LOG_LEVEL: 'verbose' }, platform: 'linux' })._unsafeUnwrapErr();

    expect(error._tag).toBe('ConfigInvalid');
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.path).toBe('SHELLWRAP_LOG_LEVEL');
  });

  it('marks BSD hosts', () => {
    expect(loadConfig({ env: {}, platform: 'freebsd' })._unsafeUnwrap().host).toEqual({ kind: 'posix', bsd: true });
    expect(loadConfig({ env: {}, platform: 'darwin' })._unsafeUnwrap().host).toEqual({ kind: 'posix', bsd: false });
  });
});
