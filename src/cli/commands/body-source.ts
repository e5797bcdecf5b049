/**
 * Body Source
 *
 * Resolves the payload for the signing commands from `--body` or `--body-file`.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse } from '../types/cli-result.js';

export interface BodyFileError {
  readonly code?: string;
  readonly message: string;
}

export interface BodySourceOptions {
  readonly body?: string;
  readonly bodyFile?: string;
}

export interface BodySourceDeps {
  readonly readBodyFile: (filePath: string) => Result<Uint8Array, BodyFileError>;
}

const utf8 = new TextEncoder();

/**
 * Neither option means an empty body.
 */
export function resolveBody(options: BodySourceOptions, deps: BodySourceDeps): Result<Uint8Array, CliResult> {
  if (options.body !== undefined && options.bodyFile !== undefined) {
    return err(misuse('Use either --body or --body-file, not both'));
  }

  if (options.bodyFile !== undefined) {
    const filePath = options.bodyFile;
    return deps.readBodyFile(filePath).mapErr((error) =>
      error.code === 'ENOENT'
        ? failure(`File not found: ${filePath}`, { suggestions: ['Check the file path and try again'] })
        : failure(`Error reading file: ${filePath}`, { details: [error.message] })
    );
  }

  return ok(utf8.encode(options.body ?? ''));
}
