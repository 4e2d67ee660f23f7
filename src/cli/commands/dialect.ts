/**
 * dialect / dialects Commands
 */

import type { CliResult } from '../types/cli-result.js';
import { misuse, success } from '../types/cli-result.js';
import type { ShellDialectRegistry } from '../../shell/dialect-registry.js';
import type { ShellDialect } from '../../shell/dialects.js';
import { formatKeyValue } from '../output-formatter.js';

function describeDialect(dialect: ShellDialect): readonly string[] {
  return [
    formatKeyValue('executable', dialect.executable),
    formatKeyValue('args', dialect.shellInvocationArgs.join(' ')),
    formatKeyValue('source', dialect.sourceCommand),
    formatKeyValue('echo', dialect.echoCommand),
    formatKeyValue('variable', dialect.variableFormat),
    formatKeyValue('prompt', dialect.promptVariable),
    formatKeyValue('bin', dialect.binSubdir),
    formatKeyValue('path separator', JSON.stringify(dialect.pathSeparator)),
    formatKeyValue('list separator', JSON.stringify(dialect.listSeparator)),
    formatKeyValue('script suffix', JSON.stringify(dialect.scriptSuffix)),
    formatKeyValue('null redirect', dialect.nullRedirect),
  ];
}

export function executeDialectCommand(name: string, registry: ShellDialectRegistry): CliResult {
  return registry.lookup(name).match(
    (dialect) => success({ message: dialect.name, details: describeDialect(dialect) }),
    (error) => misuse(error.message, [`Run "shellwrap dialects" to list the shells for this platform`])
  );
}

export function executeDialectsCommand(registry: ShellDialectRegistry): CliResult {
  return success({
    message: registry.names().join('\n'),
    details: [formatKeyValue('default', registry.defaultShell)],
  });
}
