import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ConfigOverrides, FilterConfig } from '../config/filter-config.js';
import { loadConfig } from '../config/filter-config.js';
import type { ConfigInvalidError } from '../errors/corpus-error.js';
import type { CorpusFileSystemPort } from '../ports/corpus-fs.port.js';
import { NodeCorpusFileSystem } from '../infra/local/fs/index.js';
import type { LoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'cli' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Command-line values layered over the environment. */
  readonly overrides?: ConfigOverrides;
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();

  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, ConfigInvalidError> {
  // Tests may inject config explicitly; the composition root must not overwrite it.
  if (container.isRegistered(DI.Config.Filter)) return ok(undefined);

  const configResult = loadConfig({
    env: options.env ?? process.env,
    cwd: options.cwd ?? process.cwd(),
    overrides: options.overrides,
  });
  if (configResult.isErr()) return err(configResult.error);

  container.register<FilterConfig>(DI.Config.Filter, { useValue: Object.freeze(configResult.value) });
  return ok(undefined);
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerInfra(): void {
  if (!container.isRegistered(DI.Infra.FileSystem)) {
    container.register<CorpusFileSystemPort>(DI.Infra.FileSystem, {
      useFactory: instanceCachingFactory(() => new NodeCorpusFileSystem()),
    });
  }

  if (!container.isRegistered(DI.Infra.LoggerFactory)) {
    container.register<LoggerFactory>(DI.Infra.LoggerFactory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 * Idempotent: calls after a successful initialization return immediately.
 *
 * Invalid configuration is returned, not thrown; the caller decides how to
 * report it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  registerRuntime(options);

  return registerConfig(options).map(() => {
    registerInfra();
    initialized = true;
    createBootstrapLogger('di').debug('Container initialized');
  });
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
