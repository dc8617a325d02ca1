/**
 * Bounds how many units run at once. Waiters are admitted in FIFO order as
 * slots free up.
 */
export class ConcurrencyLimiter {
  private readonly max: number;
  private active = 0;
  private peak = 0;
  private waiting: Array<() => void> = [];

  constructor(max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer (got ${max})`);
    }
    this.max = max;
  }

  get limit(): number {
    return this.max;
  }

  get inFlight(): number {
    return this.active;
  }

  /** Highest number of slots held at the same time. */
  get maxInFlight(): number {
    return this.peak;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async acquire(): Promise<void> {
    if (this.active < this.max) {
      this.take();
      return;
    }
    await new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // hand the slot straight to the next waiter
      next();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private take(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }
}
