export class Semaphore {
  private active = 0;
  private readonly queue: Array<() => void> = [];
  private readonly limit: number;

  constructor(limit: number) {
    this.limit = Number.isFinite(limit) ? Math.max(1, Math.floor(limit)) : 1;
  }

  snapshot(): { limit: number; active: number; queued: number } {
    return {
      limit: this.limit,
      active: this.active,
      queued: this.queue.length
    };
  }

  async use<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active += 1;
      return;
    }

    await new Promise<void>((resolve) => {
      this.queue.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active = Math.max(0, this.active - 1);
    this.drain();
  }

  private drain(): void {
    while (this.active < this.limit) {
      const next = this.queue.shift();
      if (!next) return;
      next();
    }
  }
}

export interface BoundedRunOptions<T, R> {
  items: readonly T[];
  concurrency: number;
  operation: (item: T, index: number) => Promise<readonly R[]>;
  onFailure?: (item: T, error: unknown) => void;
}

export interface BoundedRunResult<R> {
  results: R[];
  completed: number;
  failed: number;
}

/**
 * Runs `operation` over every item with at most `concurrency` in flight and
 * resolves once all of them have settled. A rejected item contributes nothing.
 * Results are flattened in item order, whatever order the operations finish in.
 */
export const runBounded = async <T, R>(options: BoundedRunOptions<T, R>): Promise<BoundedRunResult<R>> => {
  const semaphore = new Semaphore(options.concurrency);
  const slots: Array<readonly R[]> = new Array<readonly R[]>(options.items.length).fill([]);
  let completed = 0;
  let failed = 0;

  await Promise.all(options.items.map((item, index) => semaphore.use(async () => {
    try {
      slots[index] = await options.operation(item, index);
      completed += 1;
    } catch (error) {
      failed += 1;
      options.onFailure?.(item, error);
    }
  })));

  return {
    results: slots.flat(),
    completed,
    failed
  };
};
