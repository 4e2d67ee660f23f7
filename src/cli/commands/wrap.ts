/**
 * Wrap Command
 *
 * Writes an activation wrapper script and prints the command that runs it.
 * The script is left on disk for the caller to run and delete.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import type { HostPlatform } from '../../runtime/host-platform.js';
import type { WrapError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { ActivationRequest } from '../../shell/activation-script.js';
import type { WrapperScript } from '../../shell/activation-script-builder.js';
import { quoteForShell } from '../../shell/quoting.js';
import { defaultShellFor } from '../../shell/dialect-registry.js';
import { formatKeyValue } from '../output-formatter.js';

export interface WrapCommandDeps {
  readonly host: HostPlatform;
  readonly build: (request: ActivationRequest) => ResultAsync<WrapperScript, WrapError>;
}

export interface WrapCommandOptions {
  readonly rootPrefix: string;
  readonly prefix: string;
  readonly dev?: boolean;
  readonly debugWrapperScripts?: boolean;
}

export async function executeWrapCommand(
  args: readonly string[],
  options: WrapCommandOptions,
  deps: WrapCommandDeps
): Promise<CliResult> {
  const built = await deps.build({
    host: deps.host,
    rootPrefix: options.rootPrefix,
    envPrefix: options.prefix,
    devMode: options.dev ?? false,
    debugScripts: options.debugWrapperScripts ?? false,
    arguments: args,
  });

  return built.match(
    (script) =>
      success({
        message: quoteForShell(script.command, defaultShellFor(deps.host)),
        details: [formatKeyValue('script', script.scriptPath)],
      }),
    (error) =>
      failure(formatAppError(error), {
        suggestions:
          error._tag === 'MissingEnvironmentVariable'
            ? [`Set ${error.variable} to the path of the command interpreter`]
            : undefined,
      })
  );
}
