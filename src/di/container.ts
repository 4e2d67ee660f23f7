import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory } from '../core/logging/index.js';
import type { AppError } from '../errors/app-error.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { TempFilePort } from '../ports/temp-file.port.js';
import type { FileDigestPort } from '../ports/file-digest.port.js';
import { NodeTempFiles } from '../infra/local/temp-files/index.js';
import { LocalFileDigest } from '../infra/local/file-digest/index.js';
import { createShellDialectRegistry } from '../shell/dialect-registry.js';
import { ActivationScriptBuilder } from '../shell/activation-script-builder.js';

export { container };

export interface ContainerInitOptions {
  readonly env?: Record<string, string | undefined>;
  readonly platform?: NodeJS.Platform;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// Tests register their own values first; only missing tokens are filled in.
// ═══════════════════════════════════════════════════════════════════════════

function registerIfMissing(token: symbol, register: () => void): void {
  if (!container.isRegistered(token)) register();
}

function registerRuntime(): void {
  registerIfMissing(DI.Runtime.ProcessTerminator, () => {
    const inTest = process.env['VITEST'] !== undefined || process.env['NODE_ENV'] === 'test';
    const terminator: ProcessTerminator = inTest ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  });
  registerIfMissing(DI.Logging.Factory, () => {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  });
}

function registerPorts(): void {
  registerIfMissing(DI.Ports.TempFiles, () => {
    container.register<TempFilePort>(DI.Ports.TempFiles, {
      useFactory: instanceCachingFactory(() => new NodeTempFiles()),
    });
  });
  registerIfMissing(DI.Ports.FileDigest, () => {
    container.register<FileDigestPort>(DI.Ports.FileDigest, {
      useFactory: instanceCachingFactory(() => new LocalFileDigest()),
    });
  });
}

function registerShellServices(): void {
  registerIfMissing(DI.Shell.DialectRegistry, () => {
    container.register(DI.Shell.DialectRegistry, {
      useFactory: instanceCachingFactory((c: DependencyContainer) =>
        createShellDialectRegistry(c.resolve<ValidatedConfig>(DI.Config.App).host)
      ),
    });
  });
  registerIfMissing(DI.Shell.ActivationScriptBuilder, () => {
    container.register(DI.Shell.ActivationScriptBuilder, {
      useFactory: instanceCachingFactory(
        (c: DependencyContainer) =>
          new ActivationScriptBuilder({
            tempFiles: c.resolve<TempFilePort>(DI.Ports.TempFiles),
            environment: c.resolve<ValidatedConfig>(DI.Config.App).activation,
            logger: c.resolve<ILoggerFactory>(DI.Logging.Factory).create('ActivationScriptBuilder'),
          })
      ),
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

/**
 * Wire the container. Returns the configuration error instead of exiting,
 * so the composition root decides how to report it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): AppError | null {
  if (initialized) return null;

  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({
      env: options.env ?? process.env,
      platform: options.platform ?? process.platform,
    });
    if (configResult.isErr()) return configResult.error;
    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  registerRuntime();
  registerPorts();
  registerShellServices();
  initialized = true;
  return null;
}

export function isInitialized(): boolean {
  return initialized;
}

/** Clear every registration; tests call this between cases. */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}
