import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Test mode: signal handlers are accepted and never invoked.
 */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: () => void | Promise<void>): void {}
}
