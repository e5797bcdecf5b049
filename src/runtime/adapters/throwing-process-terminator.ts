import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so an accidental termination fails the test.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}
