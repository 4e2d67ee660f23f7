import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ActivationScriptBuilder } from '../../../src/shell/activation-script-builder.js';
import type { ActivationRequest } from '../../../src/shell/activation-script.js';
import { NodeTempFiles } from '../../../src/infra/local/temp-files/index.js';
import { POSIX_HOST, WINDOWS_HOST } from '../../../src/runtime/host-platform.js';
import { InMemoryTempFiles } from '../../fakes/temp-files.fake.js';
import { createCaptureLogger, PINO_LEVEL } from '../../helpers/capture-logger.js';
import { mkTestDir } from '../../helpers/temp-dir.js';

const COMSPEC = 'C:\\Windows\\System32\\cmd.exe';

function request(overrides: Partial<ActivationRequest> = {}): ActivationRequest {
  return {
    host: POSIX_HOST,
    rootPrefix: '/opt/root',
    envPrefix: '/opt/root/envs/py',
    devMode: false,
    debugScripts: false,
    arguments: ['true'],
    ...overrides,
  };
}

describe('ActivationScriptBuilder', () => {
  it('writes the planned script and returns the command that runs it', async () => {
    const tempFiles = new InMemoryTempFiles();
    const { logger } = createCaptureLogger();
    const builder = new ActivationScriptBuilder({ tempFiles, environment: {}, logger, localPaths: path.posix });

    const script = (await builder.build(request()))._unsafeUnwrap();

    expect(script.scriptPath).toBe('/opt/root/envs/py/.tmp1');
    expect(script.command).toEqual(['bash', '-x', '/opt/root/envs/py/.tmp1']);
    expect(tempFiles.files.get('/opt/root/envs/py/.tmp1')).toBe(script.contents);
    expect(script.contents).toBe(
      'eval "$(/opt/root/bin/conda shell.posix hook)"\nconda activate /opt/root/envs/py\ntrue\n'
    );
  });

  it('writes .bat files run through COMSPEC on Windows', async () => {
    const tempFiles = new InMemoryTempFiles();
    const { logger } = createCaptureLogger();
    const builder = new ActivationScriptBuilder({
      tempFiles,
      environment: { comspec: COMSPEC },
      logger,
      localPaths: path.win32,
    });

    const script = (
      await builder.build(request({ host: WINDOWS_HOST, rootPrefix: 'C:\\root', envPrefix: 'C:\\root\\envs\\py' }))
    )._unsafeUnwrap();

    expect(script.scriptPath).toBe('C:\\root\\envs\\py\\.tmp1.bat');
    expect(script.command).toEqual([COMSPEC, '/d', '/c', 'C:\\root\\envs\\py\\.tmp1.bat']);
  });

  it('places a script for another platform using the local path rules', async () => {
    const tempFiles = new InMemoryTempFiles();
    const { logger } = createCaptureLogger();
    const builder = new ActivationScriptBuilder({
      tempFiles,
      environment: { comspec: COMSPEC },
      logger,
      localPaths: path.posix,
    });

    const script = (
      await builder.build(request({ host: WINDOWS_HOST, rootPrefix: 'C:\\root', envPrefix: '/tmp/env' }))
    )._unsafeUnwrap();

    expect(script.scriptPath).toBe('/tmp/env/.tmp1.bat');
    expect(script.contents.split('\n')[2]).toBe('@CALL "C:\\root\\condabin\\conda.bat" activate "/tmp/env"');
  });

  it('logs each defaulted override at debug level', async () => {
    const capture = createCaptureLogger();
    const builder = new ActivationScriptBuilder({
      tempFiles: new InMemoryTempFiles(),
      environment: {},
      logger: capture.logger,
    });

    await builder.build(request());

    const defaulted = capture.entries().find((e) => e.variable === 'CONDA_EXE');
    expect(defaulted?.level).toBe(PINO_LEVEL.debug);
    expect(defaulted?.msg).toBe('Override not set, using default under root prefix');
    expect(capture.messages()).toContain('Wrapper script written');
  });

  it('fails without COMSPEC on Windows and writes nothing', async () => {
    const tempFiles = new InMemoryTempFiles();
    const capture = createCaptureLogger();
    const builder = new ActivationScriptBuilder({ tempFiles, environment: {}, logger: capture.logger });

    const error = (await builder.build(request({ host: WINDOWS_HOST, envPrefix: 'C:\\envs\\py' })))._unsafeUnwrapErr();

    expect(error._tag).toBe('MissingEnvironmentVariable');
    expect(tempFiles.files.size).toBe(0);
    expect(capture.entries()).toHaveLength(1);
    expect(capture.entries()[0]?.level).toBe(PINO_LEVEL.warn);
    expect(capture.entries()[0]?.variable).toBe('COMSPEC');
  });

  it('wraps temp file failures with the prefix', async () => {
    const tempFiles = new InMemoryTempFiles();
    tempFiles.failWith({ code: 'FS_PERMISSION_DENIED', message: 'Permission denied: /opt/root/envs/py/.tmp*' });
    const { logger } = createCaptureLogger();
    const builder = new ActivationScriptBuilder({ tempFiles, environment: {}, logger, localPaths: path.posix });

    const error = (await builder.build(request()))._unsafeUnwrapErr();

    expect(error).toEqual({
      _tag: 'TempFileFailed',
      prefix: '/opt/root/envs/py/.tmp',
      cause: { code: 'FS_PERMISSION_DENIED', message: 'Permission denied: /opt/root/envs/py/.tmp*' },
      message: 'Could not create wrapper script at /opt/root/envs/py/.tmp*: Permission denied: /opt/root/envs/py/.tmp*',
    });
  });
});

describe('ActivationScriptBuilder with NodeTempFiles', () => {
  let root: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ root, cleanup } = await mkTestDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('leaves a private script inside the environment', async () => {
    const { logger } = createCaptureLogger();
    const builder = new ActivationScriptBuilder({
      tempFiles: new NodeTempFiles(),
      environment: { condaExe: '/usr/local/bin/conda' },
      logger,
    });

    const script = (await builder.build(request({ envPrefix: root, arguments: ['echo', 'ok'] })))._unsafeUnwrap();

    expect(path.dirname(script.scriptPath)).toBe(root);
    expect(path.basename(script.scriptPath)).toMatch(/^\.tmp[0-9a-f]{12}$/);
    expect(await fs.readFile(script.scriptPath, 'utf8')).toBe(
      `eval "$(/usr/local/bin/conda shell.posix hook)"\nconda activate ${root}\necho ok\n`
    );
    if (process.platform !== 'win32') {
      const stat = await fs.stat(script.scriptPath);
      expect(stat.mode & 0o777).toBe(0o600);
    }
  });

  it('writes a .bat script for Windows inside the local environment directory', async () => {
    const { logger } = createCaptureLogger();
    const builder = new ActivationScriptBuilder({
      tempFiles: new NodeTempFiles(),
      environment: { comspec: COMSPEC },
      logger,
    });

    const script = (
      await builder.build(request({ host: WINDOWS_HOST, rootPrefix: 'C:\\root', envPrefix: root }))
    )._unsafeUnwrap();

    expect(path.dirname(script.scriptPath)).toBe(root);
    expect(path.basename(script.scriptPath)).toMatch(/^\.tmp[0-9a-f]{12}\.bat$/);
    expect(await fs.readFile(script.scriptPath, 'utf8')).toBe(script.contents);
  });
});
