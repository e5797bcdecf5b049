import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessLifecyclePolicy } from '../runtime/process-lifecycle-policy.js';
import type { ProcessSignals } from '../runtime/ports/process-signals.js';
import { NodeProcessSignals } from '../runtime/adapters/node-process-signals.js';
import { NoopProcessSignals } from '../runtime/adapters/noop-process-signals.js';
import type { ShutdownEvents } from '../runtime/ports/shutdown-events.js';
import { InMemoryShutdownEvents } from '../runtime/adapters/in-memory-shutdown-events.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import type { HmacSha256Port } from '../ports/hmac-sha256.port.js';
import { NodeHmacSha256 } from '../infra/local/hmac-sha256/index.js';
import { HmacAuthentication } from '../protocol/hmac-authentication.js';
import { SecretKey } from '../protocol/secret-key.js';
import { HttpServer } from '../infrastructure/http/HttpServer.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(env: Record<string, string | undefined>): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (env['VITEST'] || env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

function toProcessLifecyclePolicy(mode: RuntimeMode): ProcessLifecyclePolicy {
  switch (mode.kind) {
    case 'test':
      return { kind: 'no_signal_handlers' };
    case 'cli':
    case 'production':
      return { kind: 'install_signal_handlers' };
    default:
      return assertNever(mode);
  }
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  /** Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
}

function registerRuntime(mode: RuntimeMode): void {
  const policy = toProcessLifecyclePolicy(mode);

  container.register<ProcessLifecyclePolicy>(DI.Runtime.ProcessLifecyclePolicy, { useValue: policy });

  const signals: ProcessSignals =
    policy.kind === 'no_signal_handlers' ? new NoopProcessSignals() : new NodeProcessSignals();
  container.register<ProcessSignals>(DI.Runtime.ProcessSignals, { useValue: signals });

  container.register<ShutdownEvents>(DI.Runtime.ShutdownEvents, { useValue: new InMemoryShutdownEvents() });

  const terminator: ProcessTerminator =
    mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): Result<void, ConfigInvalidError> {
  // Tests may inject config before initialization; don't overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  return loadConfig({ env }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
    if (config.hmac.secret.kind === 'env' && !container.isRegistered(DI.Hmac.Secret)) {
      registerSecret(SecretKey.fromUtf8(config.hmac.secret.value));
    }
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory(
        (c: DependencyContainer) => {
          const config = c.resolve<ValidatedConfig>(DI.Config.App);
          return new PinoLoggerFactory(config.logLevel, { headerName: config.hmac.headerName });
        }
      ),
    });
  }

  if (!container.isRegistered(DI.Crypto.HmacSha256)) {
    container.register<HmacSha256Port>(DI.Crypto.HmacSha256, {
      useFactory: instanceCachingFactory(() => new NodeHmacSha256()),
    });
  }

  container.register<HmacAuthentication>(DI.Hmac.Authentication, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => {
      const config = c.resolve<ValidatedConfig>(DI.Config.App);
      return new HmacAuthentication({
        secret: c.resolve<SecretKey>(DI.Hmac.Secret),
        headerName: config.hmac.headerName,
        hmac: c.resolve<HmacSha256Port>(DI.Crypto.HmacSha256),
      });
    }),
  });

  container.register<HttpServer>(DI.Infra.HttpServer, {
    useFactory: instanceCachingFactory((c: DependencyContainer) => c.resolve(HttpServer)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container.
 *
 * Idempotent. Config errors are returned, not thrown; the caller decides
 * how to report them.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Result<void, ConfigInvalidError> {
  if (initialized) return ok(undefined);

  const env = options.env ?? process.env;
  registerRuntime(options.runtimeMode ?? detectRuntimeMode(env));

  const configured = registerConfig(env);
  if (configured.isErr()) return err(configured.error);

  registerServices();
  initialized = true;
  return ok(undefined);
}

/**
 * Register (or replace) the shared secret. `Hmac.Authentication` resolves it
 * lazily, so this must happen before the first resolution.
 */
export function registerSecret(secret: SecretKey): void {
  container.register<SecretKey>(DI.Hmac.Secret, { useValue: secret });
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
