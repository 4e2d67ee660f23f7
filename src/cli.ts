#!/usr/bin/env node
/**
 * shellwrap CLI - Composition Root
 *
 * Wires dependencies for each command and turns CliResult into an exit code.
 * Business logic lives in src/cli/commands/*.ts.
 */

import { Command } from 'commander';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { FileDigestPort } from './ports/file-digest.port.js';
import { fileSize } from './infra/local/file-digest/index.js';
import { formatAppError } from './errors/formatter.js';
import { hostPlatformFrom } from './runtime/host-platform.js';
import type { HostPlatform } from './runtime/host-platform.js';
import type { ShellDialectRegistry } from './shell/dialect-registry.js';
import { createShellDialectRegistry } from './shell/dialect-registry.js';
import type { ActivationScriptBuilder } from './shell/activation-script-builder.js';
import type { ValidatedConfig } from './config/app-config.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import { misuse } from './cli/types/cli-result.js';
import {
  executeWrapCommand,
  executeTranslateCommand,
  executeQuoteCommand,
  executeDialectCommand,
  executeDialectsCommand,
  executeHashCommand,
} from './cli/commands/index.js';

const KNOWN_PLATFORMS: readonly NodeJS.Platform[] = [
  'aix', 'android', 'darwin', 'freebsd', 'haiku', 'linux', 'openbsd', 'sunos', 'win32', 'cygwin', 'netbsd',
];

function bootstrap(): ProcessTerminator {
  const error = initializeContainer();
  if (error) {
    interpretCliResultWithoutDI(misuse(formatAppError(error)));
  }
  return container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
}

interface WrapCliOptions {
  rootPrefix: string;
  prefix: string;
  dev?: boolean;
  debugWrapperScripts?: boolean;
  platform?: string;
}

/** `--platform` targets another OS; without it the configured host is used. */
function hostFor(platform: string | undefined): HostPlatform | null {
  if (platform === undefined) {
    return container.resolve<ValidatedConfig>(DI.Config.App).host;
  }
  const known = KNOWN_PLATFORMS.find((p) => p === platform);
  return known ? hostPlatformFrom(known) : null;
}

function registryFor(platform: string | undefined): ShellDialectRegistry | null {
  if (platform === undefined) {
    return container.resolve<ShellDialectRegistry>(DI.Shell.DialectRegistry);
  }
  const host = hostFor(platform);
  return host ? createShellDialectRegistry(host) : null;
}

function unknownPlatform(platform: string | undefined): ReturnType<typeof misuse> {
  return misuse(`Unknown platform "${platform ?? ''}"`, [`Use one of: ${KNOWN_PLATFORMS.join(', ')}`]);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('shellwrap')
  .description('Path translation, shell quoting and activation wrapper scripts')
  .version('0.1.0');

program
  .command('wrap')
  .description('Write a script that activates an environment and runs <args...>; print how to run it')
  .requiredOption('--root-prefix <path>', 'Installation root (holds condabin/ or bin/)')
  .requiredOption('-p, --prefix <path>', 'Environment to activate')
  .option('--dev', 'Use <root>/bin/python -m conda as the activation entry point')
  .option('--debug-wrapper-scripts', 'Dump the environment to stderr around activation')
  .option('--platform <platform>', 'Write the script for another platform (e.g. win32)')
  .argument('<args...>', 'Command to run (use -- before it)')
  .action(async (args: string[], options: WrapCliOptions) => {
    const terminator = bootstrap();
    const host = hostFor(options.platform);
    if (!host) {
      interpretCliResult(unknownPlatform(options.platform), terminator);
      return;
    }
    const builder = container.resolve<ActivationScriptBuilder>(DI.Shell.ActivationScriptBuilder);

    const result = await executeWrapCommand(args, options, {
      host,
      build: (request) => builder.build(request),
    });

    interpretCliResult(result, terminator);
  });

program
  .command('to-windows <path>')
  .description('Translate a POSIX path or path list to Windows form')
  .option('--cygdrive', 'Input uses /cygdrive/<letter>/ drive prefixes')
  .action((input: string, options: { cygdrive?: boolean }) => {
    interpretCliResultWithoutDI(executeTranslateCommand('windows', input, options));
  });

program
  .command('to-posix <path>')
  .description('Translate a Windows path or path list to POSIX form')
  .option('--cygdrive', 'Emit /cygdrive/<letter>/ drive prefixes')
  .action((input: string, options: { cygdrive?: boolean }) => {
    interpretCliResultWithoutDI(executeTranslateCommand('posix', input, options));
  });

program
  .command('quote')
  .description('Join <args...> into one command line quoted for a shell')
  .option('-s, --shell <name>', 'Target shell (defaults to cmd.exe on Windows, bash elsewhere)')
  .argument('<args...>', 'Arguments to quote (use -- before them)')
  .action((args: string[], options: { shell?: string }) => {
    const terminator = bootstrap();
    const registry = container.resolve<ShellDialectRegistry>(DI.Shell.DialectRegistry);
    interpretCliResult(executeQuoteCommand(args, options, registry), terminator);
  });

program
  .command('dialect <name>')
  .description('Show the syntax conventions of a shell')
  .option('--platform <platform>', 'Show the table of another platform (e.g. win32)')
  .action((name: string, options: { platform?: string }) => {
    const terminator = bootstrap();
    const registry = registryFor(options.platform);
    interpretCliResult(registry ? executeDialectCommand(name, registry) : unknownPlatform(options.platform), terminator);
  });

program
  .command('dialects')
  .description('List the shells known on this platform')
  .option('--platform <platform>', 'List the shells of another platform (e.g. win32)')
  .action((options: { platform?: string }) => {
    const terminator = bootstrap();
    const registry = registryFor(options.platform);
    interpretCliResult(registry ? executeDialectsCommand(registry) : unknownPlatform(options.platform), terminator);
  });

program
  .command('hash <file>')
  .description('Print the checksum of a file')
  .option('-a, --algorithm <name>', 'Hash algorithm', 'md5')
  .action(async (filePath: string, options: { algorithm?: string }) => {
    const terminator = bootstrap();
    const digest = container.resolve<FileDigestPort>(DI.Ports.FileDigest);

    const result = await executeHashCommand(filePath, options, {
      digest: (p, algorithm) => digest.digest(p, algorithm),
      sizeOf: fileSize,
    });

    interpretCliResult(result, terminator);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
