/**
 * Quote Command
 *
 * Prints the arguments joined into one command line for a shell.
 */

import type { CliResult } from '../types/cli-result.js';
import { misuse, successMessage } from '../types/cli-result.js';
import type { ShellDialectRegistry } from '../../shell/dialect-registry.js';
import { quoteForShell } from '../../shell/quoting.js';

export interface QuoteCommandOptions {
  readonly shell?: string;
}

export function executeQuoteCommand(
  args: readonly string[],
  options: QuoteCommandOptions,
  registry: ShellDialectRegistry
): CliResult {
  return registry.resolve(options.shell).match(
    (dialect) => successMessage(quoteForShell(args, dialect.name)),
    (error) => misuse(error.message, [`Known shells: ${error.available.join(', ')}`])
  );
}
