/**
 * Runtime mode of the current process.
 * Decided once by the entry point and injected, never sniffed from env vars inside services.
 */
export type RuntimeMode =
  | { kind: 'lambda' }
  | { kind: 'cli' }
  | { kind: 'test' };
