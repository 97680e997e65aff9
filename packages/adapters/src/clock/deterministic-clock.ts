import type { ClockPort } from '@carpool/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Drives the sample-data generator so fixtures are reproducible.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max]. */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.nextInt(0, items.length - 1)];
    if (item === undefined) throw new Error('cannot pick from an empty list');
    return item;
  }
}

/**
 * Clock for tests and fixtures. Starts at `epochMs` and moves forward by
 * `tickMs` after every `now()`; a tick of 0 freezes it.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }
}

/** Wall-clock implementation used in production. */
export const systemClock: ClockPort = {
  now: () => new Date(),
};
