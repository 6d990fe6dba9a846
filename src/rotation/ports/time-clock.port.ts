/**
 * Time port for the verification backoff.
 *
 * Injectable so tests drive the retry path without wall-clock delay.
 */
export interface TimeClockPort {
  /** Milliseconds since Unix epoch. */
  nowMs(): number;

  /** Resolve after `ms` milliseconds. */
  sleepMs(ms: number): Promise<void>;
}
