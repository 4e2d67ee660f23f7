import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HostPlatform } from '../runtime/host-platform.js';
import { assertNever } from '../runtime/assert-never.js';
import type { ShellNotFoundError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { CMD_EXE, MSYS2_BASE, POSIX_BASE, cygwinDialect, deriveDialect } from './dialects.js';
import type { ShellDialect } from './dialects.js';

/**
 * Read-only table of the shells usable on one host.
 * Built once; safe to share between callers.
 */
export interface ShellDialectRegistry {
  readonly host: HostPlatform;
  /** Shell used when a caller does not name one: `cmd.exe` on Windows, `bash` elsewhere. */
  readonly defaultShell: string;
  lookup(name: string): Result<ShellDialect, ShellNotFoundError>;
  /** `lookup(name ?? defaultShell)`. */
  resolve(name?: string): Result<ShellDialect, ShellNotFoundError>;
  has(name: string): boolean;
  names(): readonly string[];
}

export function defaultShellFor(host: HostPlatform): string {
  switch (host.kind) {
    case 'windows':
      return 'cmd.exe';
    case 'posix':
      return 'bash';
    default:
      return assertNever(host);
  }
}

function windowsDialects(): readonly ShellDialect[] {
  // bash is whichever bash is on PATH; a Cygwin install should use the `cygwin` entry for /cygdrive.
  const msys2 = ['bash.exe', 'bash', 'sh.exe', 'zsh.exe', 'zsh'].map((executable) =>
    deriveDialect(executable, MSYS2_BASE, { executable })
  );
  return [CMD_EXE, cygwinDialect(), ...msys2];
}

function posixDialects(): readonly ShellDialect[] {
  return [
    deriveDialect('bash', POSIX_BASE, { executable: 'bash' }),
    deriveDialect('dash', POSIX_BASE, { executable: 'dash', sourceCommand: '.' }),
    deriveDialect('zsh', POSIX_BASE, { executable: 'zsh' }),
    // fish keeps PATH as a list and prints it space-separated
    deriveDialect('fish', POSIX_BASE, { executable: 'fish', listSeparator: ' ' }),
  ];
}

export function createShellDialectRegistry(host: HostPlatform): ShellDialectRegistry {
  const entries = host.kind === 'windows' ? windowsDialects() : posixDialects();
  const table: ReadonlyMap<string, ShellDialect> = new Map(entries.map((d) => [d.name, d]));
  const names = Object.freeze([...table.keys()]);
  const defaultShell = defaultShellFor(host);

  const lookup = (name: string): Result<ShellDialect, ShellNotFoundError> => {
    const dialect = table.get(name);
    return dialect ? ok(dialect) : err(Err.shellNotFound(name, names));
  };

  return Object.freeze({
    host,
    defaultShell,
    lookup,
    resolve: (name?: string) => lookup(name ?? defaultShell),
    has: (name: string) => table.has(name),
    names: () => names,
  });
}
