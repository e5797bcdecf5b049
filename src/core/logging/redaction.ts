import { DEFAULT_HEADER_NAME } from '../../config/app-config.js';

export const REDACTED = '[REDACTED]';

export interface RedactionConfig {
  readonly paths: string[];
  readonly censor: string;
}

/**
 * Redaction configuration for pino.
 *
 * The secret and signature values must never reach a log line, even when a
 * whole config object or request headers are logged by mistake. The
 * signature header is whatever the deployment configured.
 */
export function redactionConfig(headerName: string = DEFAULT_HEADER_NAME): RedactionConfig {
  const header = JSON.stringify(headerName.toLowerCase());

  return {
    paths: [
      'secret',
      'signature',
      'authorization',

      '*.secret',
      '*.signature',

      'config.hmac.secret',

      'headers.authorization',
      `headers[${header}]`,
      'req.headers.authorization',
      `req.headers[${header}]`,
    ],
    censor: REDACTED,
  };
}
