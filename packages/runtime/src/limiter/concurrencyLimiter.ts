import {
  type Deferred,
  CancelledError,
  InvalidReleaseError,
  createDeferred,
} from '@flotilla/core';

interface Waiter {
  deferred: Deferred<void>;
  dispose(): void;
}

/**
 * Counting semaphore gating every remote call. Waiters are served FIFO and a
 * released slot passes straight to the oldest waiter, so a burst of new
 * arrivals cannot overtake callers that are already queued.
 */
export class ConcurrencyLimiter {
  public readonly capacity: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  public constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ConcurrencyLimiter capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /** Slots currently held. */
  public get inFlight(): number {
    return this.active;
  }

  /** Callers suspended in acquire(). */
  public get pending(): number {
    return this.waiters.length;
  }

  public async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError('Admission cancelled before a slot was acquired');
    }
    if (this.active < this.capacity) {
      this.active += 1;
      return;
    }

    const deferred = createDeferred<void>();
    const onAbort = () => {
      const index = this.waiters.indexOf(waiter);
      if (index >= 0) {
        this.waiters.splice(index, 1);
      }
      deferred.reject(new CancelledError('Admission cancelled while waiting for a slot'));
    };
    const waiter: Waiter = {
      deferred,
      dispose: () => signal?.removeEventListener('abort', onAbort),
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    this.waiters.push(waiter);

    await deferred.promise;
  }

  public release(): void {
    if (this.active === 0) {
      throw new InvalidReleaseError('ConcurrencyLimiter.release() called without a matching acquire()');
    }
    const next = this.waiters.shift();
    if (next) {
      next.dispose();
      next.deferred.resolve();
      return;
    }
    this.active -= 1;
  }

  /** Runs `task` while holding a slot; the slot is returned on every exit path. */
  public async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
