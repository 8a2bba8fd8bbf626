/**
 * FIFO slot limiter. With one slot it acts as a mutex around the backend
 * call, so at most one model request is in flight.
 */
export class ConcurrencyLimiter {
  private activeCount = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly maxSlots = 1) {}

  get active(): number {
    return this.activeCount;
  }

  async acquireSlot(): Promise<void> {
    if (this.activeCount < this.maxSlots) {
      this.activeCount++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  releaseSlot(): void {
    const next = this.queue.shift();
    if (next) {
      // slot passes straight to the next waiter
      next();
      return;
    }
    this.activeCount = Math.max(0, this.activeCount - 1);
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      return await task();
    } finally {
      this.releaseSlot();
    }
  }
}

export const backendLimiter = new ConcurrencyLimiter(1);
