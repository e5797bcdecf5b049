/**
 * Port for terminating the current process.
 * Only composition roots (the CLI entrypoint) should hold one.
 */
export type TerminationCode =
  | { kind: 'success' }
  | { kind: 'failure' }
  | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: TerminationCode): never;
}
