// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Path translation
export {
  CYGDRIVE_PREFIX,
  asCygwinPath,
  asPosixPath,
  asWindowsPath,
  cygwinToWindows,
  looksLikeWindowsPath,
  pathIdentity,
  posixToWindows,
  translateStream,
  windowsToCygwin,
  windowsToPosix,
} from './shell/path-translator.js';
export type { CygwinPath, PathConverter, PosixPath, WindowsPath } from './shell/path-translator.js';

// Shell dialects
export { CMD_EXE, MSYS2_BASE, POSIX_BASE, deriveDialect, formatVariable } from './shell/dialects.js';
export type { DialectOverrides, ShellDialect, ShellDialectTemplate } from './shell/dialects.js';
export { createShellDialectRegistry, defaultShellFor } from './shell/dialect-registry.js';
export type { ShellDialectRegistry } from './shell/dialect-registry.js';

// Quoting
export {
  joinPosixCommandLine,
  joinWindowsCommandLine,
  quoteArguments,
  quoteForShell,
  quotingFamilyOf,
} from './shell/quoting.js';
export type { QuotingFamily } from './shell/quoting.js';

// Wrapper scripts
export { classifyCommand, planActivationScript, tempFilePrefix } from './shell/activation-script.js';
export type {
  ActivationEnvironment,
  ActivationRequest,
  CommandShape,
  ScriptPlan,
} from './shell/activation-script.js';
export { ActivationScriptBuilder } from './shell/activation-script-builder.js';
export type { ActivationScriptBuilderDeps, WrapperScript } from './shell/activation-script-builder.js';

// Ports and local adapters
export type { TempFilePort, CreateTempFileRequest } from './ports/temp-file.port.js';
export type { FileDigestPort } from './ports/file-digest.port.js';
export { DIGEST_CHUNK_BYTES } from './ports/file-digest.port.js';
export type { FsError } from './ports/fs-error.js';
export { NodeTempFiles } from './infra/local/temp-files/index.js';
export { LocalFileDigest, fileSize, md5File } from './infra/local/file-digest/index.js';

// Runtime, config, errors
export { hostPlatformFrom, POSIX_HOST, WINDOWS_HOST } from './runtime/host-platform.js';
export type { HostPlatform } from './runtime/host-platform.js';
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export * from './errors/index.js';

// Logging
export { PinoLoggerFactory, createRootLogger, LOG_LEVELS } from './core/logging/index.js';
export type { ILoggerFactory, Logger, LogLevel } from './core/logging/index.js';

export { humanBytes } from './utils/human-bytes.js';
