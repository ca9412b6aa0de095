/**
 * Counting semaphore bounding how many operations run at once.
 *
 * Waiters are served in arrival order. One instance is shared by every fetch site
 * of a run; creating a second instance creates a second, independent bound.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private peak = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${capacity}`);
    }
  }

  /** Operations currently holding a slot */
  get inFlight(): number {
    return this.active;
  }

  /** Highest number of slots held at the same time since creation or the last reset */
  get peakInFlight(): number {
    return this.peak;
  }

  /** Operations waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Wait for a slot. The returned function releases it and is safe to call more than once.
   */
  async acquire(): Promise<() => void> {
    if (this.active < this.capacity) {
      this.occupy();
    } else {
      // The releasing holder hands its slot straight to us
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  /**
   * Run `operation` while holding a slot
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await operation();
    } finally {
      release();
    }
  }

  resetPeak(): void {
    this.peak = this.active;
  }

  private occupy(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}
