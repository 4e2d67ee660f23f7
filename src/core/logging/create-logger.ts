import 'reflect-metadata';
import pino from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

/**
 * Root pino logger: JSON, ISO timestamps, synchronous writes to stderr (fd 2).
 * Callers print command vectors on stdout, so logs never go there.
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Level comes from SHELLWRAP_LOG_LEVEL via the validated config (default: silent).
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config.logging.level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
