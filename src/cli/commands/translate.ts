/**
 * to-windows / to-posix Commands
 */

import type { CliResult } from '../types/cli-result.js';
import { successMessage } from '../types/cli-result.js';
import {
  CYGDRIVE_PREFIX,
  asPosixPath,
  asWindowsPath,
  posixToWindows,
  windowsToPosix,
} from '../../shell/path-translator.js';

export type TranslateTarget = 'windows' | 'posix';

export interface TranslateCommandOptions {
  readonly cygdrive?: boolean;
}

export function executeTranslateCommand(
  target: TranslateTarget,
  input: string,
  options: TranslateCommandOptions = {}
): CliResult {
  const prefix = options.cygdrive ? CYGDRIVE_PREFIX : '';
  const translated =
    target === 'windows'
      ? posixToWindows(asPosixPath(input), prefix)
      : windowsToPosix(asWindowsPath(input), prefix);
  return successMessage(translated);
}
