import type { Clock } from '@occupancy-meter/types';

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to. Used by tests and replays.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(time: number): void {
    this.current = time;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
