/**
 * Ballot Ledger — Clocks
 *
 * The registry and the ballot store never read the wall clock directly;
 * they ask a `Clock` for the current unix time in seconds.
 *
 * @module clock
 * @license AGPL-3.0-or-later
 */

export interface Clock {
  /** Current unix time, in whole seconds */
  now(): number;
}

/** Wall-clock time. */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * A clock that only moves when told to.
 *
 * @example
 * ```ts
 * const clock = new ManualClock(1_700_000_000);
 * clock.advance(3600);
 * clock.now(); // 1700003600
 * ```
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number = Math.floor(Date.now() / 1000)) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
