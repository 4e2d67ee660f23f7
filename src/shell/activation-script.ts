/**
 * Wrapper-script text for "activate an environment, then run a command".
 *
 * Pure: computes suffix, contents and interpreter vector for the target host.
 * Where the file goes on the local disk is the builder's job
 * (activation-script-builder.ts).
 */

import * as path from 'path';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HostPlatform } from '../runtime/host-platform.js';
import { isWindowsHost } from '../runtime/host-platform.js';
import type { MissingEnvironmentVariableError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { joinPosixCommandLine, joinWindowsCommandLine } from './quoting.js';

export interface ActivationRequest {
  readonly host: HostPlatform;
  /** Installation root holding `condabin/conda.bat` or `bin/conda`. */
  readonly rootPrefix: string;
  /** Environment to activate; the wrapper script is created inside it. */
  readonly envPrefix: string;
  /** Run the activation entry point from sources via `<root>/bin/python -m conda`. */
  readonly devMode: boolean;
  /** Dump the environment to stderr before and after activation. */
  readonly debugScripts: boolean;
  readonly arguments: readonly string[];
}

/** Overrides read from the process environment. Empty means "use the default". */
export interface ActivationEnvironment {
  readonly comspec?: string;
  readonly condaBat?: string;
  readonly condaExe?: string;
}

export type ActivationOverride = 'CONDA_BAT' | 'CONDA_EXE';

export interface ScriptPlan {
  readonly suffix: string;
  readonly contents: string;
  /** Command vector preceding the script path. */
  readonly interpreter: readonly string[];
  /** Overrides that were absent and fell back to a path under the root prefix. */
  readonly defaulted: readonly ActivationOverride[];
}

/**
 * What ends up as the last section of the script.
 * A lone argument with a newline is an opaque script body, written verbatim.
 */
export type CommandShape =
  | { readonly kind: 'multiline'; readonly body: string }
  | { readonly kind: 'single'; readonly argument: string }
  | { readonly kind: 'argv'; readonly args: readonly string[] };

export function classifyCommand(args: readonly string[]): CommandShape {
  const [only] = args;
  if (args.length === 1 && only !== undefined) {
    return only.includes('\n') ? { kind: 'multiline', body: only } : { kind: 'single', argument: only };
  }
  return { kind: 'argv', args };
}

/**
 * `<envPrefix>/.tmp`, absolute. Files are named `.tmp<random>` inside the environment.
 * `paths` are the rules of the machine writing the file, not of the script's target.
 */
export function tempFilePrefix(paths: path.PlatformPath, envPrefix: string): string {
  return paths.resolve(paths.join(envPrefix, '.tmp'));
}

function lines(...content: readonly string[]): string {
  return content.map((line) => `${line}\n`).join('');
}

export function planActivationScript(
  request: ActivationRequest,
  env: ActivationEnvironment
): Result<ScriptPlan, MissingEnvironmentVariableError> {
  return isWindowsHost(request.host) ? planWindowsScript(request, env) : ok(planPosixScript(request, env));
}

function planWindowsScript(
  request: ActivationRequest,
  env: ActivationEnvironment
): Result<ScriptPlan, MissingEnvironmentVariableError> {
  // No sensible default exists for the command interpreter.
  if (!env.comspec) return err(Err.missingEnvironmentVariable('COMSPEC'));

  const p = path.win32;
  const condaBat = env.condaBat || p.resolve(p.join(request.rootPrefix, 'condabin', 'conda.bat'));
  const command = classifyCommand(request.arguments);

  const contents = lines(
    `@FOR /F "tokens=100" %%F IN ('chcp') DO @SET CONDA_OLD_CHCP=%%F`,
    '@chcp 65001>NUL',
    `@CALL "${condaBat}" activate "${request.envPrefix}"`,
    // Multiline bodies are not silenced: that would be needed on every line.
    command.kind === 'multiline' ? command.body : `@${joinWindowsCommandLine(request.arguments)}`,
    '@chcp %CONDA_OLD_CHCP%>NUL'
  );

  return ok({
    suffix: '.bat',
    contents,
    interpreter: [env.comspec, '/d', '/c'],
    defaulted: env.condaBat ? [] : ['CONDA_BAT'],
  });
}

function activationExecutable(request: ActivationRequest, env: ActivationEnvironment): readonly string[] {
  const p = path.posix;
  if (request.devMode) {
    // Runs the development sources against an environment's (possibly older) python.
    return [p.resolve(p.join(request.rootPrefix, 'bin', 'python')), '-m', 'conda'];
  }
  return [env.condaExe || p.resolve(p.join(request.rootPrefix, 'bin', 'conda'))];
}

function planPosixScript(request: ActivationRequest, env: ActivationEnvironment): ScriptPlan {
  const hook = joinPosixCommandLine([...activationExecutable(request, env), 'shell.posix', 'hook']);
  const command = classifyCommand(request.arguments);

  const debugBefore = request.debugScripts
    ? [`>&2 echo '*** environment before ***'`, '>&2 env', `>&2 echo "$(${hook})"`]
    : [];
  const debugAfter = request.debugScripts ? [`>&2 echo '*** environment after ***'`, '>&2 env'] : [];

  const contents = lines(
    ...debugBefore,
    `eval "$(${hook})"`,
    `conda activate ${joinPosixCommandLine([request.envPrefix])}`,
    ...debugAfter,
    renderPosixCommand(command)
  );

  const shell = request.host.kind === 'posix' && request.host.bsd ? 'sh' : 'bash';

  return {
    suffix: '',
    contents,
    interpreter: [shell, '-x'],
    defaulted: request.devMode || env.condaExe ? [] : ['CONDA_EXE'],
  };
}

function renderPosixCommand(command: CommandShape): string {
  switch (command.kind) {
    case 'multiline':
      return command.body;
    case 'single':
      return command.argument;
    case 'argv':
      return joinPosixCommandLine(command.args);
  }
}
