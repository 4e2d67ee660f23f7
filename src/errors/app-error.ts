import type { Brand } from '../runtime/brand.js';
import type { FsError } from '../ports/fs-error.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/** Unknown shell name in the dialect registry. */
export type ShellNotFoundError = Readonly<{
  readonly _tag: 'ShellNotFound';
  readonly shell: string;
  readonly available: readonly string[];
  readonly message: string;
}>;

export type MissingEnvironmentVariableError = Readonly<{
  readonly _tag: 'MissingEnvironmentVariable';
  readonly variable: string;
  readonly message: string;
}>;

export type TempFileFailedError = Readonly<{
  readonly _tag: 'TempFileFailed';
  readonly prefix: string;
  readonly cause: FsError;
  readonly message: string;
}>;

export type UnsupportedDigestAlgorithmError = Readonly<{
  readonly _tag: 'UnsupportedDigestAlgorithm';
  readonly algorithm: string;
  readonly message: string;
}>;

export type DigestFailedError = Readonly<{
  readonly _tag: 'DigestFailed';
  readonly path: string;
  readonly cause: FsError;
  readonly message: string;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

/** Failures of a single wrapper-script build. */
export type WrapError = MissingEnvironmentVariableError | TempFileFailedError;

export type DigestError = UnsupportedDigestAlgorithmError | DigestFailedError;

export type AppError =
  | ConfigInvalidError
  | ShellNotFoundError
  | WrapError
  | DigestError
  | UnexpectedError;

/**
 * Branded config type: only `loadConfig` (or a test helper) can produce one.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
