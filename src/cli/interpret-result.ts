/**
 * CLI Result Interpreter
 *
 * The only place where a CliResult turns into process termination.
 */

import type { CliResult } from './types/cli-result.js';
import { toTerminationCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

export function interpretCliResult(
  result: CliResult,
  terminator: ProcessTerminator
): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so a running server keeps it alive.
      return;

    case 'failure':
      terminator.terminate(toTerminationCode(result.exitCode));
  }
}
