import pLimit from 'p-limit';

export interface WorkerLease {
  release(): void;
}

export class WorkerPoolClosedError extends Error {
  constructor() {
    super('Worker pool is closed');
    this.name = 'WorkerPoolClosedError';
  }
}

/**
 * Bounded set of worker slots on top of a p-limit limiter. Each lease holds
 * one limiter slot until released; waiters are served in arrival order.
 */
export class WorkerPool {
  private readonly limit: ReturnType<typeof pLimit>;
  // Rejecters of acquire() calls still queued in the limiter.
  private readonly waiting = new Set<(err: Error) => void>();
  private closed = false;

  constructor(size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.limit = pLimit(size);
  }

  acquire(): Promise<WorkerLease> {
    if (this.closed) return Promise.reject(new WorkerPoolClosedError());
    return new Promise<WorkerLease>((resolve, reject) => {
      this.waiting.add(reject);
      this.limit(
        () =>
          new Promise<void>((free) => {
            this.waiting.delete(reject);
            if (this.closed) {
              free();
              reject(new WorkerPoolClosedError());
              return;
            }
            resolve(this.lease(free));
          }),
      ).catch(reject);
    });
  }

  /** Rejects queued waiters; leases already handed out may still be released. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.limit.clearQueue();
    for (const reject of this.waiting) reject(new WorkerPoolClosedError());
    this.waiting.clear();
  }

  private lease(free: () => void): WorkerLease {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        free();
      },
    };
  }
}
