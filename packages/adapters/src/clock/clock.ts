import type { ClockPort } from '@campus-shuttle/domain';

/** Wall-clock implementation for the running server. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Manually driven clock for tests and replays.
 * Stays at `epoch` until moved with `set()` or `advance()`.
 */
export class FixedClock implements ClockPort {
  private currentMs: number;

  constructor(epoch: Date | number) {
    this.currentMs = typeof epoch === 'number' ? epoch : epoch.getTime();
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  set(at: Date): void {
    this.currentMs = at.getTime();
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}
