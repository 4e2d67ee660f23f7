import * as path from 'path';
import { errAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { WrapError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { TempFilePort } from '../ports/temp-file.port.js';
import { planActivationScript, tempFilePrefix } from './activation-script.js';
import type { ActivationEnvironment, ActivationRequest } from './activation-script.js';

/**
 * A written wrapper script. The file belongs to the caller, who must delete it
 * once the process started from `command` no longer needs it.
 */
export interface WrapperScript {
  readonly scriptPath: string;
  /** OS-level command vector that runs the script, e.g. `[COMSPEC, '/d', '/c', scriptPath]`. */
  readonly command: readonly string[];
  readonly contents: string;
}

export interface ActivationScriptBuilderDeps {
  readonly tempFiles: TempFilePort;
  readonly environment: ActivationEnvironment;
  readonly logger: Logger;
  /** Path rules of the machine the script is written on. Defaults to the running host's. */
  readonly localPaths?: path.PlatformPath;
}

/**
 * Writes one wrapper script per call: activate `envPrefix`, then run the arguments.
 * Nothing is executed here.
 */
export class ActivationScriptBuilder {
  constructor(private readonly deps: ActivationScriptBuilderDeps) {}

  build(request: ActivationRequest): ResultAsync<WrapperScript, WrapError> {
    const planned = planActivationScript(request, this.deps.environment);
    if (planned.isErr()) {
      this.deps.logger.warn({ variable: planned.error.variable }, planned.error.message);
      return errAsync(planned.error);
    }

    const plan = planned.value;
    const tempPrefix = tempFilePrefix(this.deps.localPaths ?? path, request.envPrefix);
    for (const variable of plan.defaulted) {
      this.deps.logger.debug({ variable, rootPrefix: request.rootPrefix }, 'Override not set, using default under root prefix');
    }

    return this.deps.tempFiles
      .createTempFile({ prefix: tempPrefix, suffix: plan.suffix, contents: plan.contents })
      .mapErr((cause) => Err.tempFileFailed(tempPrefix, cause))
      .map((scriptPath) => {
        const script: WrapperScript = {
          scriptPath,
          command: [...plan.interpreter, scriptPath],
          contents: plan.contents,
        };
        this.deps.logger.debug({ scriptPath, command: script.command }, 'Wrapper script written');
        return script;
      });
  }
}
