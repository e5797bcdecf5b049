import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { redactionConfig } from './redaction.js';

/**
 * HMAC_GATE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: info
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'info';
}

export interface RootLoggerOptions {
  /** Signature header to redact; defaults to x-hmac. */
  readonly headerName?: string;
  /** Defaults to stderr (stdout is kept for CLI output). Tests capture lines in memory. */
  readonly destination?: DestinationStream;
}

/**
 * Create a root pino logger: JSON lines, ISO timestamps, secrets and the
 * signature header redacted.
 */
export function createRootLogger(level: LogLevel, options: RootLoggerOptions = {}): Logger {
  return pino(
    {
      level,
      redact: redactionConfig(options.headerName),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Registered by the composition root with the configured level.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel, options: RootLoggerOptions = {}) {
    this._root = createRootLogger(level, options);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
