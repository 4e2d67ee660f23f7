export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  DigestError,
  DigestFailedError,
  MissingEnvironmentVariableError,
  ShellNotFoundError,
  TempFileFailedError,
  UnexpectedError,
  UnsupportedDigestAlgorithmError,
  ValidatedAppConfig,
  WrapError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
