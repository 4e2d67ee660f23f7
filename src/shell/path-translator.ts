/**
 * Path translation between POSIX-style, Cygwin-style and native Windows paths.
 *
 * All functions are pure string rewrites; nothing here touches the filesystem.
 * Each accepts a single path or a list joined with the convention's list
 * separator (`:` for POSIX, `;` for Windows).
 *
 * Drive letters are written upper-case in Windows form and lower-case in
 * POSIX form, so `/c/foo` and `C:\foo` translate into each other.
 */

import type { Brand } from '../runtime/brand.js';

export type PosixPath = Brand<string, 'PosixPath'>;
export type WindowsPath = Brand<string, 'WindowsPath'>;
export type CygwinPath = Brand<string, 'CygwinPath'>;

/** Dialect-level converter; dialects mix conventions so the brand is dropped here. */
export type PathConverter = (path: string) => string;

export const CYGDRIVE_PREFIX = '/cygdrive';

export function asPosixPath(value: string): PosixPath {
  return value as PosixPath;
}

export function asWindowsPath(value: string): WindowsPath {
  return value as WindowsPath;
}

export function asCygwinPath(value: string): CygwinPath {
  return value as CygwinPath;
}

/** Converter for shells that already speak the host's native convention. */
export function pathIdentity(path: string): string {
  return path;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

/**
 * Heuristic: `;` anywhere, or a single colon sitting right after a drive letter.
 * Inputs that trip it are normalized to backslashes and otherwise left alone.
 */
export function looksLikeWindowsPath(path: string): boolean {
  return path.length > 1 && (path.includes(';') || (path[1] === ':' && countOf(path, ':') === 1));
}

/**
 * Convert a POSIX path (or `:`-separated list) into its Windows form.
 *
 * `cygdrivePrefix` is prepended to the drive pattern; pass `/cygdrive` for
 * Cygwin-mangled paths (see {@link cygwinToWindows}).
 *
 * @example posixToWindows(asPosixPath('/c/Users/x')) === 'C:\\Users\\x'
 * @example posixToWindows(asPosixPath('/c/a:/d/b')) === 'C:\\a;D:\\b'
 */
export function posixToWindows(path: PosixPath | CygwinPath, cygdrivePrefix = ''): WindowsPath {
  if (looksLikeWindowsPath(path)) {
    return asWindowsPath(path.replace(/\//g, '\\'));
  }

  const drivePath = new RegExp(`${escapeRegExp(cygdrivePrefix)}(/[a-zA-Z]/(?:(?![:\\s]/)[^:*?"<>])*)`, 'g');
  const translated = path
    .replace(drivePath, (_match: string, found: string) => {
      const letter = found.charAt(1).toUpperCase();
      return `${letter}:${found.slice(2).replace(/\//g, '\\')}`;
    })
    // Joined lists come out as `C:\a:D:\b`; restore the Windows list separator.
    .replace(/:([a-zA-Z]):\\/g, (_match: string, letter: string) => `;${letter}:\\`);

  return asWindowsPath(translated);
}

/**
 * Convert a Windows path (or `;`-separated list) into its POSIX form,
 * optionally under a `cygdrivePrefix` such as `/cygdrive`.
 *
 * @example windowsToPosix(asWindowsPath('C:\\Users\\x')) === '/c/Users/x'
 */
export function windowsToPosix(path: WindowsPath, cygdrivePrefix = ''): PosixPath {
  const drivePath = /(?<![:/^a-zA-Z])([a-zA-Z]:[/\\]+(?:[^:*?"<>|]+[/\\]+)*[^:*?"<>|;/\\]+?(?![a-zA-Z]:))/g;
  const translated = path
    .replace(drivePath, (_match: string, found: string) => {
      const rest = found.slice(1).replace(/\\/g, '/').replace(/:/g, '').replace(/\/\//g, '/');
      return `${cygdrivePrefix}/${found.charAt(0).toLowerCase()}${rest}`;
    })
    .replace(/;\//g, ':/');

  return asPosixPath(translated);
}

export function cygwinToWindows(path: CygwinPath): WindowsPath {
  return posixToWindows(path, CYGDRIVE_PREFIX);
}

export function windowsToCygwin(path: WindowsPath): CygwinPath {
  return asCygwinPath(windowsToPosix(path, CYGDRIVE_PREFIX));
}

/**
 * Apply `translator` to each line of `text` (e.g. the output of `echo $PATH`).
 */
export function translateStream(text: string, translator: PathConverter): string {
  return text.split('\n').map(translator).join('\n');
}
