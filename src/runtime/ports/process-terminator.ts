/**
 * Port for terminating the current process.
 * Only the CLI composition root uses it; the Lambda entry point never exits the process.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
