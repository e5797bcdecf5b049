/**
 * Serve Command
 *
 * Starts the demo server.
 * Note: the server keeps running after this returns; the composition root
 * waits for a shutdown request.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { SecretMissingError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { formatAppError } from '../../errors/formatter.js';
import type { SecretKey } from '../../protocol/secret-key.js';
import { secretMissing } from './signing-deps.js';

export interface ServeCommandOptions {
  readonly port?: string;
}

export interface ServeCommandDeps {
  readonly secret: Result<SecretKey, SecretMissingError>;
  readonly headerName: string;
  /** Resolves with the URL the server listens on. */
  readonly startServer: (secret: SecretKey, port: number | undefined) => Promise<string>;
}

function parsePort(raw: string | undefined): number | undefined | null {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) return null;
  const port = Number(raw);
  return port <= 65535 ? port : null;
}

export async function executeServeCommand(
  options: ServeCommandOptions,
  deps: ServeCommandDeps
): Promise<CliResult> {
  if (deps.secret.isErr()) return secretMissing(deps.secret.error);

  const port = parsePort(options.port);
  if (port === null) {
    return misuse(`Invalid port: ${options.port}`, ['Use a number between 0 and 65535']);
  }

  try {
    const url = await deps.startServer(deps.secret.value, port);
    return success({
      message: `Listening on ${url}`,
      details: [`Requests must carry a valid "${deps.headerName}" header`, 'Press Ctrl+C to stop'],
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(formatAppError(Err.startupFailed('listen', message, error)));
  }
}
