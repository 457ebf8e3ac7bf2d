/**
 * Caps how many invocations run at once. Extra work waits in FIFO
 * order; a finishing task hands its slot straight to the next waiter.
 *
 * Producers that must not outrun the limiter (the stream consumer)
 * wait on `whenAvailable()` before handing over more work.
 */
export class InvocationLimiter {
  private active = 0;
  private readonly waiting: Array<() => void> = [];
  private readonly capacityWaiters: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${max}`);
    }
    this.max = max;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  /** Resolves once a slot is free and nothing is queued for it. */
  whenAvailable(): Promise<void> {
    if (this.hasCapacity()) return Promise.resolve();
    return new Promise((resolve) => {
      this.capacityWaiters.push(resolve);
    });
  }

  private hasCapacity(): boolean {
    return this.active < this.max && this.waiting.length === 0;
  }

  private acquire(): Promise<void> {
    if (this.active < this.max) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next !== undefined) {
      next();
      return;
    }
    this.active--;

    for (const notify of this.capacityWaiters.splice(0)) {
      notify();
    }
  }
}
