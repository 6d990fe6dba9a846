import { setTimeout as delay } from 'node:timers/promises';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';

/**
 * Node time adapter using platform timers.
 */
export class NodeTimeClock implements TimeClockPort {
  nowMs(): number {
    return Date.now();
  }

  async sleepMs(ms: number): Promise<void> {
    await delay(ms);
  }
}
