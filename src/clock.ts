/**
 * Clock abstraction used by the polling loop.
 *
 * - `now()` returns a monotonic instant in milliseconds.
 * - `sleep(ms)` suspends the caller for `ms` milliseconds.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

/** Real clock backed by `performance.now()` and timers. */
export class SystemClock implements Clock {
  now(): number {
    return performance.now();
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Clock that only moves when told to. `sleep` advances time instantly and
 * records the requested duration, which keeps polling tests deterministic.
 */
export class ManualClock implements Clock {
  private current: number;
  public readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(Math.max(0, ms));
  }
}
