import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, unwrapped.
 *
 * Data-first calls:
 *   logger.debug({ scriptPath }, 'Wrapper script written');
 *   logger.error({ err: error }, 'Build failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
