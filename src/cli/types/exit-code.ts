import type { TerminationCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - includes "signature does not verify"
  | { kind: 'misuse' };        // 2 - bad arguments, missing secret

export function toTerminationCode(exitCode: ExitCode): TerminationCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
  }
}
