import {
  cygwinToWindows,
  asCygwinPath,
  asPosixPath,
  asWindowsPath,
  pathIdentity,
  posixToWindows,
  windowsToCygwin,
  windowsToPosix,
} from './path-translator.js';
import type { PathConverter } from './path-translator.js';

/**
 * Syntax and path conventions of one shell.
 *
 * `pathFrom` turns a path printed by the shell into the host's native form;
 * `pathTo` turns a native path into something the shell understands.
 */
export interface ShellDialect {
  readonly name: string;
  readonly executable: string;
  /** Directory under an environment prefix holding executables; keeps its trailing separator. */
  readonly binSubdir: string;
  /** Separator between path components. */
  readonly pathSeparator: string;
  /** Separator between entries of a path list such as PATH. */
  readonly listSeparator: string;
  readonly sourceCommand: string;
  /** Template for a variable reference; `{}` is replaced by the name. */
  readonly variableFormat: string;
  readonly echoCommand: string;
  readonly promptVariable: string;
  readonly scriptSuffix: string;
  readonly envScriptSuffix: string;
  readonly shellInvocationArgs: readonly string[];
  readonly pathFrom: PathConverter;
  readonly pathTo: PathConverter;
  readonly nullRedirect: string;
  readonly setVariable: string;
  readonly printPath: string;
  readonly printDefaultEnv: string;
  readonly printPrompt: string;
  /** Characters swapped when normalizing separators for this shell: [from, to]. */
  readonly slashConvert: readonly [string, string];
  readonly testEchoExtra: string;
}

/** A base template; concrete dialects add `name` and `executable`. */
export type ShellDialectTemplate = Omit<ShellDialect, 'name' | 'executable'>;

export type DialectOverrides = Partial<Omit<ShellDialect, 'name' | 'executable'>> &
  Pick<ShellDialect, 'executable'>;

export const POSIX_BASE: ShellDialectTemplate = Object.freeze({
  binSubdir: '/bin/',
  echoCommand: 'echo',
  envScriptSuffix: '.sh',
  nullRedirect: '2>/dev/null',
  pathFrom: pathIdentity,
  pathTo: pathIdentity,
  listSeparator: ':',
  printDefaultEnv: 'echo $CONDA_DEFAULT_ENV',
  printPath: 'echo $PATH',
  printPrompt: 'echo $CONDA_PROMPT_MODIFIER',
  promptVariable: 'PS1',
  pathSeparator: '/',
  setVariable: 'export ',
  shellInvocationArgs: Object.freeze(['-l', '-c']),
  scriptSuffix: '',
  slashConvert: Object.freeze(['\\', '/'] as const),
  sourceCommand: 'source',
  testEchoExtra: '',
  variableFormat: '${}',
});

/** MSYS2 (and Git Bash) on Windows: POSIX syntax, Windows paths underneath. */
export const MSYS2_BASE: ShellDialectTemplate = Object.freeze({
  ...POSIX_BASE,
  pathFrom: (path: string) => posixToWindows(asPosixPath(path)),
  pathTo: (path: string) => windowsToPosix(asWindowsPath(path)),
  printPath:
    'python -c "import os; print(\';\'.join(os.environ[\'PATH\'].split(\';\')[1:]))" | cygpath --path -f -',
});

export const CMD_EXE: ShellDialect = Object.freeze({
  name: 'cmd.exe',
  executable: 'cmd.exe',
  binSubdir: '\\Scripts\\',
  echoCommand: '@echo',
  envScriptSuffix: '.bat',
  nullRedirect: '1>NUL 2>&1',
  pathFrom: pathIdentity,
  pathTo: pathIdentity,
  listSeparator: ';',
  // Unbalanced parentheses are deliberate: `echo(` prints an empty line in cmd.
  printDefaultEnv: 'IF NOT "%CONDA_DEFAULT_ENV%" == "" (\necho %CONDA_DEFAULT_ENV% ) ELSE (\necho()',
  printPath: '@echo %PATH%',
  printPrompt: '@echo %PROMPT%',
  promptVariable: 'PROMPT',
  pathSeparator: '\\',
  setVariable: 'set ',
  shellInvocationArgs: Object.freeze(['/d', '/c']),
  scriptSuffix: '.bat',
  slashConvert: Object.freeze(['/', '\\'] as const),
  sourceCommand: 'call',
  testEchoExtra: '',
  variableFormat: '%{}%',
});

/**
 * Build a named dialect from a base template. Returns a new frozen record;
 * the base is never modified.
 */
export function deriveDialect(
  name: string,
  base: ShellDialectTemplate,
  overrides: DialectOverrides
): ShellDialect {
  return Object.freeze({ ...base, ...overrides, name });
}

/** Cygwin spells drives `/cygdrive/c/...` and keeps entry points in `Scripts`. */
export function cygwinDialect(): ShellDialect {
  return deriveDialect('cygwin', POSIX_BASE, {
    executable: 'bash.exe',
    binSubdir: '/Scripts/',
    pathFrom: (path: string) => cygwinToWindows(asCygwinPath(path)),
    pathTo: (path: string) => windowsToCygwin(asWindowsPath(path)),
  });
}

/** Render a reference to `variable` in the dialect's syntax, e.g. `${PATH}` or `%PATH%`. */
export function formatVariable(dialect: ShellDialect, variable: string): string {
  return dialect.variableFormat.replace('{}', variable);
}
