export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  /** Receives a signal that is aborted once the timeout fires. */
  run: (signal: AbortSignal) => Promise<T>;
}

export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      input.run(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const error = new TimeoutError(input.label, input.timeoutMs);
          reject(error);
          controller.abort(error);
        }, input.timeoutMs);
      })
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  // The executor runs synchronously, so these are replaced before anyone can call them.
  let settle: Pick<Deferred<T>, 'resolve' | 'reject'> = { resolve: () => {}, reject: () => {} };
  const promise = new Promise<T>((resolve, reject) => {
    settle = { resolve, reject };
  });
  return {
    promise,
    resolve: (value) => settle.resolve(value),
    reject: (error) => settle.reject(error),
  };
}
