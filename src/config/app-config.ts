/**
 * Application configuration - parse, don't validate.
 *
 * - The process environment is read here and nowhere else
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, ValidatedAppConfig } from '../errors/app-error.js';
import type { HostPlatform } from '../runtime/host-platform.js';
import { hostPlatformFrom } from '../runtime/host-platform.js';
import { LOG_LEVELS } from '../core/logging/types.js';
import type { LogLevel } from '../core/logging/types.js';
import type { ActivationEnvironment } from '../shell/activation-script.js';

export interface AppConfig {
  readonly host: HostPlatform;
  readonly activation: ActivationEnvironment;
  readonly logging: { readonly level: LogLevel };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
  readonly platform: NodeJS.Platform;
}

// =============================================================================
// Schema
// =============================================================================

/** Unset and blank both mean "not configured". */
const optionalSetting = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const EnvSchema = z.object({
  COMSPEC: optionalSetting,
  CONDA_BAT: optionalSetting,
  CONDA_EXE: optionalSetting,
  SHELLWRAP_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).default('silent')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(createValidatedConfig(buildConfig(parsed.data, options.platform)));
}

/**
 * Tests and local construction only: brands a config without env parsing.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, platform: NodeJS.Platform): AppConfig {
  return {
    host: hostPlatformFrom(platform),
    activation: {
      comspec: env.COMSPEC,
      condaBat: env.CONDA_BAT,
      condaExe: env.CONDA_EXE,
    },
    logging: { level: env.SHELLWRAP_LOG_LEVEL },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
