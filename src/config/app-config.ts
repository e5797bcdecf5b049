/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError, SecretMissingError, ValidatedAppConfig } from '../errors/app-error.js';
import { SecretKey } from '../protocol/secret-key.js';
import type { StatusPolicy } from '../protocol/status-policy.js';
import { DEFAULT_STATUS_POLICY } from '../protocol/status-policy.js';
import { isValidHeaderName } from '../protocol/hmac-authentication.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type HeaderName = Brand<string, 'HeaderName'>;
export type ServerPort = Brand<number, 'ServerPort'>;
export type MaxBodyBytes = Brand<number, 'MaxBodyBytes'>;

/**
 * The secret is optional at load time: `sign-*` and `verify` can take it from
 * the command line, and only `serve` requires it from the environment.
 */
export type SecretSource = { readonly kind: 'env'; readonly value: string } | { readonly kind: 'unset' };

export interface AppConfig {
  readonly hmac: {
    readonly secret: SecretSource;
    readonly headerName: HeaderName;
    readonly maxBodyBytes: MaxBodyBytes;
    readonly statusPolicy: StatusPolicy;
  };
  readonly server: {
    readonly port: ServerPort;
  };
  readonly logLevel: LogLevel;
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export const SECRET_ENV_VAR = 'HMAC_GATE_SECRET';
export const DEFAULT_HEADER_NAME = 'x-hmac';
export const DEFAULT_PORT = 3000;
export const DEFAULT_MAX_BODY_BYTES = 10 * 1024 * 1024;

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? fallback : Number(v)));

const statusFromEnv = <T extends number>(allowed: readonly [T, T], fallback: T) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v === '' ? fallback : Number(v)))
    .pipe(
      z.number().refine((n): n is T => allowed.some((a) => a === n), {
        message: `must be one of ${allowed.join(', ')}`,
      })
    );

const EnvSchema = z.object({
  HMAC_GATE_SECRET: z.string().min(1, 'HMAC_GATE_SECRET cannot be empty').optional(),

  HMAC_GATE_HEADER: z
    .string()
    .default(DEFAULT_HEADER_NAME)
    .refine(isValidHeaderName, 'HMAC_GATE_HEADER must be a valid HTTP header name'),

  HMAC_GATE_PORT: numberFromEnv(DEFAULT_PORT).pipe(
    z.number().int().min(0, 'Port must be >= 0').max(65535, 'Port must be <= 65535')
  ),

  HMAC_GATE_MAX_BODY_BYTES: numberFromEnv(DEFAULT_MAX_BODY_BYTES).pipe(
    z.number().int().min(0, 'HMAC_GATE_MAX_BODY_BYTES cannot be negative')
  ),

  HMAC_GATE_MISSING_HEADER_STATUS: statusFromEnv<401 | 403>([401, 403], DEFAULT_STATUS_POLICY.missingHeader),
  HMAC_GATE_MALFORMED_HEADER_STATUS: statusFromEnv<400 | 403>([400, 403], DEFAULT_STATUS_POLICY.malformedHeader),
  HMAC_GATE_REJECTED_STATUS: statusFromEnv<401 | 403>([401, 403], DEFAULT_STATUS_POLICY.authenticationFailed),

  HMAC_GATE_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info')),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

/**
 * The secret to sign and verify with: an explicit value (the CLI's `--secret`)
 * wins over the environment.
 */
export function resolveSecret(explicit: string | undefined, config: AppConfig): Result<SecretKey, SecretMissingError> {
  if (explicit !== undefined && explicit !== '') return ok(SecretKey.fromUtf8(explicit));

  switch (config.hmac.secret.kind) {
    case 'env':
      return ok(SecretKey.fromUtf8(config.hmac.secret.value));
    case 'unset':
      return err(Err.secretMissing(SECRET_ENV_VAR));
  }
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const secret: SecretSource =
    env.HMAC_GATE_SECRET === undefined ? { kind: 'unset' } : { kind: 'env', value: env.HMAC_GATE_SECRET };

  return {
    hmac: {
      secret,
      headerName: env.HMAC_GATE_HEADER.toLowerCase() as HeaderName,
      maxBodyBytes: env.HMAC_GATE_MAX_BODY_BYTES as MaxBodyBytes,
      statusPolicy: {
        missingHeader: env.HMAC_GATE_MISSING_HEADER_STATUS,
        malformedHeader: env.HMAC_GATE_MALFORMED_HEADER_STATUS,
        authenticationFailed: env.HMAC_GATE_REJECTED_STATUS,
        bodyReadError: 500,
      },
    },
    server: {
      port: env.HMAC_GATE_PORT as ServerPort,
    },
    logLevel: env.HMAC_GATE_LOG_LEVEL,
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
