import {
  type Deferred,
  type Logger,
  type PoolDrainReport,
  type PoolInitReport,
  type PoolSlot,
  type PoolStats,
  type Session,
  type SessionState,
  type SlotFailure,
  CancelledError,
  InvalidReleaseError,
  InvalidRequestError,
  PoolExhaustedError,
  createDeferred,
  describeError,
} from '@flotilla/core';

import { type SessionCallRunner } from '../calls/sessionCallRunner';

export interface SessionPoolOptions {
  capacity: number;
  agentId: string;
  calls: SessionCallRunner;
  /** State sent when creating the session for a slot. */
  initialState?: SessionState | ((slot: number) => SessionState);
  /** Default wait bound for acquire(); unset waits indefinitely. */
  acquireTimeoutMs?: number;
  logger?: Logger;
}

export interface AcquireOptions {
  /** Overrides the pool's default wait bound. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Waiter {
  deferred: Deferred<Session>;
  dispose(): void;
}

/**
 * Fixed-capacity set of pre-created sessions.
 *
 * Every slot transition happens inside a synchronous block with no await in
 * between, which makes the slot table safe to share across concurrent callers
 * on the event loop.
 */
export class SessionPool {
  public readonly capacity: number;
  private readonly agentId: string;
  private readonly calls: SessionCallRunner;
  private readonly initialState: SessionState | ((slot: number) => SessionState);
  private readonly acquireTimeoutMs: number | undefined;
  private readonly logger: Logger | undefined;

  private readonly slots: PoolSlot[];
  private readonly waiters: Waiter[] = [];
  private draining = false;
  private readonly retirements = new Set<Promise<void>>();
  private retiredCount = 0;
  private retireFailures: SlotFailure[] = [];

  public constructor(options: SessionPoolOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`SessionPool capacity must be a positive integer, got ${options.capacity}`);
    }
    this.capacity = options.capacity;
    this.agentId = options.agentId;
    this.calls = options.calls;
    this.initialState = options.initialState ?? {};
    this.acquireTimeoutMs = options.acquireTimeoutMs;
    this.logger = options.logger?.child({ component: 'session-pool' });
    this.slots = Array.from(
      { length: options.capacity },
      (_, index): PoolSlot => ({ index, state: 'empty', session: null })
    );
  }

  /**
   * Creates sessions for every empty slot among the first `size` slots.
   * Slots whose creation fails stay empty and are listed in the report;
   * calling initialize() again retries them. Also reopens a drained pool.
   * Sessions created after a drain started are deleted and reported as
   * failed with kind `Drained`.
   */
  public async initialize(size: number = this.capacity): Promise<PoolInitReport> {
    if (!Number.isInteger(size) || size < 0 || size > this.capacity) {
      throw new InvalidRequestError(`Pool size must be an integer between 0 and ${this.capacity}, got ${size}`);
    }
    this.draining = false;

    const targets = this.slots.slice(0, size).filter((slot) => slot.state === 'empty');
    for (const slot of targets) {
      slot.state = 'initializing';
    }

    const failures = await Promise.all(targets.map((slot) => this.fill(slot)));
    const failed = failures.filter((failure): failure is SlotFailure => failure !== null);
    const report: PoolInitReport = {
      requested: targets.length,
      created: targets.length - failed.length,
      failed,
    };

    if (failed.length > 0) {
      this.logger?.warn({ ...report, failed: failed.length }, 'Session pool partially initialized');
    } else {
      this.logger?.info({ requested: report.requested, created: report.created }, 'Session pool initialized');
    }
    return report;
  }

  /**
   * Hands out an available session, or waits (FIFO) until one is released or
   * finishes initializing. Fails with PoolExhaustedError once the wait bound
   * elapses, and immediately on a drained pool.
   */
  public acquire(options: AcquireOptions = {}): Promise<Session> {
    if (this.draining) {
      return Promise.reject(new PoolExhaustedError('Session pool is drained'));
    }
    if (options.signal?.aborted) {
      return Promise.reject(new CancelledError('Pool acquisition cancelled'));
    }

    const slot = this.slots.find((candidate) => candidate.state === 'available');
    if (slot?.session) {
      slot.state = 'in_use';
      return Promise.resolve(slot.session);
    }

    const timeoutMs = options.timeoutMs ?? this.acquireTimeoutMs;
    const deferred = createDeferred<Session>();
    const signal = options.signal;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const remove = () => {
      const index = this.waiters.indexOf(waiter);
      if (index >= 0) {
        this.waiters.splice(index, 1);
      }
      waiter.dispose();
    };
    const onAbort = () => {
      remove();
      deferred.reject(new CancelledError('Pool acquisition cancelled'));
    };
    const waiter: Waiter = {
      deferred,
      dispose: () => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      },
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        remove();
        deferred.reject(new PoolExhaustedError(`No pooled session became available within ${timeoutMs}ms`));
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });
    this.waiters.push(waiter);

    return deferred.promise;
  }

  /**
   * Returns an acquired session to circulation. While the pool is draining
   * the session is deleted instead; awaitRetirements() reports the outcome.
   */
  public release(session: Session): void {
    const slot = session.slotIndex === undefined ? undefined : this.slots[session.slotIndex];
    if (!slot || slot.session?.id !== session.id) {
      throw new InvalidReleaseError(`Session ${session.id} does not belong to this pool`);
    }
    if (slot.state !== 'in_use') {
      throw new InvalidReleaseError(`Session ${session.id} is not in use (slot ${slot.index} is ${slot.state})`);
    }

    if (this.draining) {
      slot.state = 'empty';
      slot.session = null;
      this.retire(slot.index, session);
      return;
    }
    this.offer(slot, session);
  }

  /** Acquire, run `task`, release on every exit path. */
  public async withSession<T>(task: (session: Session) => Promise<T>, options?: AcquireOptions): Promise<T> {
    const session = await this.acquire(options);
    try {
      return await task(session);
    } finally {
      this.release(session);
    }
  }

  /**
   * Deletes every available session and empties its slot. Waiting acquirers
   * fail with PoolExhaustedError; sessions still in use are deleted when
   * they are released.
   */
  public async drain(): Promise<PoolDrainReport> {
    this.draining = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter.dispose();
      waiter.deferred.reject(new PoolExhaustedError('Session pool is draining'));
    }

    const targets: Array<{ slot: number; session: Session }> = [];
    for (const slot of this.slots) {
      if (slot.state === 'available' && slot.session) {
        targets.push({ slot: slot.index, session: slot.session });
        slot.state = 'empty';
        slot.session = null;
      }
    }

    const results = await Promise.all(targets.map((target) => this.remove(target.slot, target.session)));
    const failed = results.filter((failure): failure is SlotFailure => failure !== null);
    const report: PoolDrainReport = { deleted: targets.length - failed.length, failed };

    this.logger?.info(
      { deleted: report.deleted, failed: failed.length, stillInUse: this.count('in_use') },
      'Session pool drained'
    );
    return report;
  }

  /**
   * Waits for deletions triggered by releases during a drain and reports
   * them. Each deletion is reported once.
   */
  public async awaitRetirements(): Promise<PoolDrainReport> {
    while (this.retirements.size > 0) {
      await Promise.all([...this.retirements]);
    }
    const report: PoolDrainReport = { deleted: this.retiredCount, failed: this.retireFailures };
    this.retiredCount = 0;
    this.retireFailures = [];
    return report;
  }

  public stats(): PoolStats {
    return {
      capacity: this.capacity,
      empty: this.count('empty'),
      initializing: this.count('initializing'),
      available: this.count('available'),
      inUse: this.count('in_use'),
      waiting: this.waiters.length,
      draining: this.draining,
    };
  }

  private async fill(slot: PoolSlot): Promise<SlotFailure | null> {
    try {
      const session = await this.calls.createSession(this.agentId, this.stateFor(slot.index));
      session.slotIndex = slot.index;
      if (this.draining) {
        slot.state = 'empty';
        this.retire(slot.index, session);
        return { slot: slot.index, error: { kind: 'Drained', message: `Pool drained while slot ${slot.index} was initializing` } };
      }
      this.offer(slot, session);
      return null;
    } catch (error) {
      slot.state = 'empty';
      slot.session = null;
      const failure = { slot: slot.index, error: describeError(error) };
      this.logger?.warn({ slot: slot.index, ...failure.error }, 'Pool slot creation failed');
      return failure;
    }
  }

  /** Puts a ready session into `slot`, handing it to the oldest waiter if there is one. */
  private offer(slot: PoolSlot, session: Session): void {
    slot.session = session;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.dispose();
      slot.state = 'in_use';
      waiter.deferred.resolve(session);
      return;
    }
    slot.state = 'available';
  }

  private retire(slot: number, session: Session): void {
    const pending = this.remove(slot, session).then((failure) => {
      if (failure) {
        this.retireFailures.push(failure);
      } else {
        this.retiredCount += 1;
      }
    });
    this.retirements.add(pending);
    void pending.finally(() => this.retirements.delete(pending));
  }

  private async remove(slot: number, session: Session): Promise<SlotFailure | null> {
    try {
      await this.calls.deleteSession(session.id);
      return null;
    } catch (error) {
      const failure = { slot, error: describeError(error) };
      this.logger?.warn({ slot, sessionId: session.id, ...failure.error }, 'Failed to delete pooled session');
      return failure;
    }
  }

  private stateFor(slot: number): SessionState {
    return typeof this.initialState === 'function' ? this.initialState(slot) : { ...this.initialState };
  }

  private count(state: PoolSlot['state']): number {
    return this.slots.filter((slot) => slot.state === state).length;
  }
}
