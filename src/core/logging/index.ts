// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory, createRootLogger, resolveLogLevel } from './create-logger.js';
export type { RootLoggerOptions } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

// Redaction config (for testing/verification)
export { redactionConfig, REDACTED } from './redaction.js';
export type { RedactionConfig } from './redaction.js';
