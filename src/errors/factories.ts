import type { FsError } from '../ports/fs-error.js';
import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  DigestFailedError,
  MissingEnvironmentVariableError,
  ShellNotFoundError,
  TempFileFailedError,
  UnexpectedError,
  UnsupportedDigestAlgorithmError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  shellNotFound: (shell: string, available: readonly string[]): ShellNotFoundError => ({
    _tag: 'ShellNotFound',
    shell,
    available,
    message: available.length > 0
      ? `Unknown shell "${shell}". Known shells: ${available.join(', ')}`
      : `Unknown shell "${shell}"`,
  }),

  missingEnvironmentVariable: (variable: string): MissingEnvironmentVariableError => ({
    _tag: 'MissingEnvironmentVariable',
    variable,
    message: `Required environment variable ${variable} is not set`,
  }),

  tempFileFailed: (prefix: string, cause: FsError): TempFileFailedError => ({
    _tag: 'TempFileFailed',
    prefix,
    cause,
    message: `Could not create wrapper script at ${prefix}*: ${cause.message}`,
  }),

  unsupportedDigestAlgorithm: (algorithm: string): UnsupportedDigestAlgorithmError => ({
    _tag: 'UnsupportedDigestAlgorithm',
    algorithm,
    message: `Unsupported digest algorithm: ${algorithm}`,
  }),

  digestFailed: (path: string, cause: FsError): DigestFailedError => ({
    _tag: 'DigestFailed',
    path,
    cause,
    message: `Could not hash ${path}: ${cause.message}`,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
