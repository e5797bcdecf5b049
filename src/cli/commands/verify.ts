/**
 * Verify Command
 *
 * Runs the server-side check against a request described on the command line.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure } from '../types/cli-result.js';
import { authenticateRequest, bufferedRequest } from '../../protocol/request-authenticator.js';
import type { BodySourceDeps, BodySourceOptions } from './body-source.js';
import { resolveBody } from './body-source.js';
import type { SigningDeps } from './signing-deps.js';
import { checkRequestPath, secretMissing } from './signing-deps.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface VerifyCommandOptions extends BodySourceOptions {
  readonly method: string;
  readonly path: string;
  readonly signature: string;
}

export interface VerifyCommandDeps extends SigningDeps, BodySourceDeps {
  readonly headerName: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Exit code 1 when the signature is rejected.
 */
export function executeVerifyCommand(options: VerifyCommandOptions, deps: VerifyCommandDeps): CliResult {
  if (deps.secret.isErr()) return secretMissing(deps.secret.error);

  const badPath = checkRequestPath(options.path);
  if (badPath) return badPath;

  const body = resolveBody(options, deps);
  if (body.isErr()) return body.error;

  const method = options.method.toUpperCase();
  const outcome = authenticateRequest(deps.hmac, {
    secret: deps.secret.value,
    headerName: deps.headerName,
    headerValues: [options.signature],
    request: bufferedRequest(method, options.path, body.value),
  });

  if (outcome.kind === 'allowed') {
    return success({ message: `Signature is valid for ${method} ${options.path}` });
  }

  return failure(outcome.reason.message, {
    details: [`code: ${outcome.reason.code}`],
  });
}
