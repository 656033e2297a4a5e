import os from 'node:os';

/**
 * FIFO counting semaphore. `run` waits for a free slot, so at most `max`
 * tasks are in flight at any time.
 */
export class AsyncSemaphore {
  private active = 0;
  private queue: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    this.max = Number.isFinite(max) && max > 0 ? Math.floor(max) : 1;
  }

  get capacity(): number {
    return this.max;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.max) {
      // The releasing task hands its slot over, so `active` is already counted.
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.active += 1;
    }
    try {
      return await task();
    } finally {
      const next = this.queue.shift();
      if (next) next();
      else this.active -= 1;
    }
  }
}

export function defaultParallelism(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Maps `items` through `worker` with bounded concurrency. Results keep input
 * order; the first rejection rejects the whole call.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new AsyncSemaphore(limit);
  return Promise.all(items.map((item, index) => semaphore.run(() => worker(item, index))));
}
