// Protocol core
export * from './protocol/index.js';

// Crypto backend
export type { HmacSha256Port, HmacSha256Stream } from './ports/hmac-sha256.port.js';
export { NodeHmacSha256 } from './infra/local/hmac-sha256/index.js';

// Express integration
export {
  createHmacMiddleware,
  hmacMiddleware,
  pathWithoutQuery,
  type HmacMiddlewareOptions,
  type HmacMiddlewarePair,
  type RejectionBody,
  type StandaloneHmacMiddlewareOptions,
} from './infrastructure/http/hmac-middleware.js';
export { HttpServer, GREETING } from './infrastructure/http/HttpServer.js';

// Configuration
export {
  loadConfig,
  resolveSecret,
  createValidatedConfig,
  DEFAULT_MAX_BODY_BYTES,
  DEFAULT_HEADER_NAME,
  type AppConfig,
  type ValidatedConfig,
  type LoadConfigOptions,
} from './config/app-config.js';

// DI Container
export { initializeContainer, registerSecret, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Errors and logging
export * from './errors/index.js';
export { createRootLogger, type Logger, type ILoggerFactory, type LogLevel } from './core/logging/index.js';
