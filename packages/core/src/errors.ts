export type SessionErrorKind =
  | 'Unreachable'
  | 'RemoteError'
  | 'InvalidRequest'
  | 'SessionNotFound'
  | 'PoolExhausted'
  | 'InvalidRelease';

/**
 * Base class of the orchestration error taxonomy. `kind` is the stable
 * discriminator; `retryable` tells the retry executor whether another attempt
 * may succeed.
 */
export abstract class SessionError extends Error {
  public abstract readonly kind: SessionErrorKind;
  public abstract readonly retryable: boolean;
}

export class UnreachableError extends SessionError {
  public readonly kind = 'Unreachable' as const;
  public readonly retryable = true;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'UnreachableError';
  }
}

export class RemoteError extends SessionError {
  public readonly kind = 'RemoteError' as const;
  public readonly retryable = true;
  public readonly status: number | undefined;

  public constructor(message: string, status?: number) {
    super(message);
    this.name = 'RemoteError';
    this.status = status;
  }
}

export class InvalidRequestError extends SessionError {
  public readonly kind = 'InvalidRequest' as const;
  public readonly retryable = false;

  public constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class SessionNotFoundError extends SessionError {
  public readonly kind = 'SessionNotFound' as const;
  public readonly retryable = false;
  public readonly sessionId: string;

  public constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

export class PoolExhaustedError extends SessionError {
  public readonly kind = 'PoolExhausted' as const;
  public readonly retryable = false;

  public constructor(message: string) {
    super(message);
    this.name = 'PoolExhaustedError';
  }
}

export class InvalidReleaseError extends SessionError {
  public readonly kind = 'InvalidRelease' as const;
  public readonly retryable = false;

  public constructor(message: string) {
    super(message);
    this.name = 'InvalidReleaseError';
  }
}

/** Raised when an AbortSignal ends a wait for a limiter or pool slot. */
export class CancelledError extends Error {
  public constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isSessionError(error: unknown): error is SessionError {
  return error instanceof SessionError;
}

export function isRetryableError(error: unknown): boolean {
  return isSessionError(error) && error.retryable;
}

/** Maps any thrown value to the `{ kind, message }` pair used in reports. */
export function describeError(error: unknown): { kind: string; message: string } {
  if (isSessionError(error)) {
    return { kind: error.kind, message: error.message };
  }
  if (error instanceof CancelledError) {
    return { kind: 'Cancelled', message: error.message };
  }
  if (error instanceof Error) {
    return { kind: 'RemoteError', message: error.message };
  }
  return { kind: 'RemoteError', message: String(error) };
}
