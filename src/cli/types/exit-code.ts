/**
 * Typed exit codes for CLI commands.
 * Maps to standard Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' }        // 0
  | { kind: 'general_error' }  // 1 - rotation or upstream failure
  | { kind: 'misuse' };        // 2 - bad arguments, missing environment

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): { kind: 'success' } | { kind: 'failure' } {
  return exitCode.kind === 'success' ? { kind: 'success' } : { kind: 'failure' };
}
