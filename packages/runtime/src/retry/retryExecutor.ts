import {
  type Logger,
  RETRY_DEFAULTS,
  describeError,
  isRetryableError,
  sleep,
} from '@flotilla/core';

export interface RetryPolicy {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  /** Ceiling applied to the exponential part of the delay. */
  maxDelayMs: number;
  jitterMs: number;
}

export interface RetryNotice {
  label: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryExecutorOptions extends Partial<RetryPolicy> {
  /** Defaults to the SessionError `retryable` flag (Unreachable, RemoteError). */
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (notice: RetryNotice) => void;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

interface RetryState {
  attempt: number;
  nextDelayMs: number;
}

/**
 * Bounded exponential-backoff retry around a single call. Holds no state
 * between invocations: every execute() gets a fresh RetryState.
 */
export class RetryExecutor {
  public readonly policy: Readonly<RetryPolicy>;
  private readonly isRetryable: (error: unknown) => boolean;
  private readonly onRetry: ((notice: RetryNotice) => void) | undefined;
  private readonly logger: Logger | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  public constructor(options: RetryExecutorOptions = {}) {
    const policy: RetryPolicy = {
      maxAttempts: options.maxAttempts ?? RETRY_DEFAULTS.MAX_ATTEMPTS,
      baseDelayMs: options.baseDelayMs ?? RETRY_DEFAULTS.BASE_DELAY_MS,
      multiplier: options.multiplier ?? RETRY_DEFAULTS.MULTIPLIER,
      maxDelayMs: options.maxDelayMs ?? RETRY_DEFAULTS.MAX_DELAY_MS,
      jitterMs: options.jitterMs ?? RETRY_DEFAULTS.JITTER_MS,
    };
    validatePolicy(policy);

    this.policy = policy;
    this.isRetryable = options.isRetryable ?? isRetryableError;
    this.onRetry = options.onRetry;
    this.logger = options.logger?.child({ component: 'retry-executor' });
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /** Delay slept after the given failed attempt (1-based), before the next one. */
  public delayAfter(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs, jitterMs } = this.policy;
    const expo = Math.min(maxDelayMs, baseDelayMs * Math.pow(multiplier, attempt - 1));
    const jitter = jitterMs > 0 ? Math.floor(this.random() * (jitterMs + 1)) : 0;
    return expo + jitter;
  }

  public async execute<T>(run: (attempt: number) => Promise<T>, label = 'remote call'): Promise<T> {
    const state: RetryState = { attempt: 0, nextDelayMs: 0 };

    for (;;) {
      state.attempt += 1;
      try {
        return await run(state.attempt);
      } catch (error) {
        const exhausted = state.attempt >= this.policy.maxAttempts;
        if (exhausted || !this.isRetryable(error)) {
          if (exhausted && state.attempt > 1) {
            this.logger?.warn({ label, attempts: state.attempt, ...describeError(error) }, 'Retry budget exhausted');
          }
          throw error;
        }

        state.nextDelayMs = this.delayAfter(state.attempt);
        this.logger?.warn(
          { label, attempt: state.attempt, delayMs: state.nextDelayMs, ...describeError(error) },
          'Retryable failure, backing off'
        );
        this.onRetry?.({ label, attempt: state.attempt, delayMs: state.nextDelayMs, error });
        await this.sleep(state.nextDelayMs);
      }
    }
  }
}

function validatePolicy(policy: RetryPolicy): void {
  const invalid: string[] = [];
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) invalid.push('maxAttempts');
  if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) invalid.push('baseDelayMs');
  if (!Number.isFinite(policy.multiplier) || policy.multiplier < 1) invalid.push('multiplier');
  if (!Number.isFinite(policy.maxDelayMs) || policy.maxDelayMs < 0) invalid.push('maxDelayMs');
  if (!Number.isFinite(policy.jitterMs) || policy.jitterMs < 0) invalid.push('jitterMs');

  if (invalid.length > 0) {
    throw new RangeError(`Invalid retry policy: invalid ${invalid.join(', ')}`);
  }
}
