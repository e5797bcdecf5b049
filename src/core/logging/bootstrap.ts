import type { Logger } from './types.js';
import { createRootLogger, resolveLogLevel } from './create-logger.js';

/**
 * Logger for code that runs before the DI container exists
 * (CLI entry point, standalone middleware construction).
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(resolveLogLevel(process.env['HMAC_GATE_LOG_LEVEL']));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
