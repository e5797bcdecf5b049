/**
 * Sign Response Command
 *
 * Prints the header value a server attaches to a response body.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { signResponse } from '../../protocol/response-signer.js';
import type { BodySourceDeps, BodySourceOptions } from './body-source.js';
import { resolveBody } from './body-source.js';
import type { SigningDeps } from './signing-deps.js';
import { secretMissing } from './signing-deps.js';

export type SignResponseCommandOptions = BodySourceOptions;

export interface SignResponseCommandDeps extends SigningDeps, BodySourceDeps {}

export function executeSignResponseCommand(
  options: SignResponseCommandOptions,
  deps: SignResponseCommandDeps
): CliResult {
  if (deps.secret.isErr()) return secretMissing(deps.secret.error);

  const body = resolveBody(options, deps);
  if (body.isErr()) return body.error;

  return success({
    message: `Signed response (${body.value.length} byte body)`,
    data: signResponse(deps.hmac, deps.secret.value, body.value),
  });
}
