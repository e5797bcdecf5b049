import type { Result } from 'neverthrow';
import type { SecretMissingError } from '../../errors/app-error.js';
import type { HmacSha256Port } from '../../ports/hmac-sha256.port.js';
import type { SecretKey } from '../../protocol/secret-key.js';
import type { CliResult } from '../types/cli-result.js';
import { misuse } from '../types/cli-result.js';

/**
 * What every command that signs or verifies needs.
 */
export interface SigningDeps {
  readonly secret: Result<SecretKey, SecretMissingError>;
  readonly hmac: HmacSha256Port;
}

export function secretMissing(error: SecretMissingError): CliResult {
  return misuse(error.message, [`export ${error.variable}=<secret>`, 'or pass --secret <secret>']);
}

/**
 * Request paths are signed without their query string; reject one here
 * rather than print a signature the server will never accept.
 */
export function checkRequestPath(path: string): CliResult | null {
  if (!path.startsWith('/')) {
    return misuse(`Path must start with "/": ${path}`);
  }
  if (path.includes('?')) {
    return misuse(`Path must not include a query string: ${path}`, [
      `Sign "${path.slice(0, path.indexOf('?'))}" instead; the query is not covered by the signature`,
    ]);
  }
  return null;
}
