/**
 * Sign Request Command
 *
 * Prints the header value a client must send with a request.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { computeRequestDigest } from '../../protocol/request-authenticator.js';
import { bytesToHex } from '../../protocol/encoding/hex.js';
import type { BodySourceDeps, BodySourceOptions } from './body-source.js';
import { resolveBody } from './body-source.js';
import type { SigningDeps } from './signing-deps.js';
import { checkRequestPath, secretMissing } from './signing-deps.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface SignRequestCommandOptions extends BodySourceOptions {
  readonly method: string;
  readonly path: string;
}

export interface SignRequestCommandDeps extends SigningDeps, BodySourceDeps {}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeSignRequestCommand(
  options: SignRequestCommandOptions,
  deps: SignRequestCommandDeps
): CliResult {
  if (deps.secret.isErr()) return secretMissing(deps.secret.error);

  const badPath = checkRequestPath(options.path);
  if (badPath) return badPath;

  const body = resolveBody(options, deps);
  if (body.isErr()) return body.error;

  // Servers see the method uppercased.
  const method = options.method.toUpperCase();
  const digest = computeRequestDigest(deps.hmac, deps.secret.value, method, options.path, body.value);

  return success({
    message: `Signed ${method} ${options.path} (${body.value.length} byte body)`,
    data: bytesToHex(digest),
  });
}
