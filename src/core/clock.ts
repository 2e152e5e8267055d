import { performance } from 'node:perf_hooks';

/**
 * Time source. Deadlines use the monotonic reading; timestamps published to
 * clients use wall time.
 */
export interface Clock {
  /** Monotonic milliseconds, unaffected by wall-clock adjustments. */
  monotonicMs(): number;
  /** Wall-clock milliseconds since the epoch. */
  wallMs(): number;
}

export const systemClock: Clock = {
  monotonicMs: () => performance.now(),
  wallMs: () => Date.now(),
};

/**
 * Hand-driven clock for deterministic lease arithmetic.
 */
export class ManualClock implements Clock {
  private monotonic = 0;

  constructor(private wall: number = Date.UTC(2025, 0, 1)) {}

  monotonicMs(): number {
    return this.monotonic;
  }

  wallMs(): number {
    return this.wall;
  }

  advance(ms: number): void {
    this.monotonic += ms;
    this.wall += ms;
  }
}
