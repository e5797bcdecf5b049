import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals.
 * Wraps handlers to drop Node-provided parameters (exit code, signal name).
 * A rejected async handler is reported on stderr; there is no caller left to return it to.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    const listener = (): void => {
      Promise.resolve(handler()).catch((error: unknown) => {
        console.error(`[ProcessSignals] ${signal} handler failed:`, error);
      });
    };

    if (signal === 'exit') {
      process.on('exit', listener);
    } else {
      process.on(signal, listener);
    }
  }
}
