import {
  type Logger,
  type MessageReply,
  type RemoteOperation,
  type Session,
  type SessionBackendPort,
  type SessionError,
  type SessionState,
  type SessionSummary,
  type TelemetrySinkPort,
  InvalidRequestError,
  RemoteError,
  SessionNotFoundError,
  TimeoutError,
  UnreachableError,
  createSessionRequestSchema,
  formatIssues,
  isSessionError,
  sendMessageRequestSchema,
  sessionIdSchema,
  withTimeout,
} from '@flotilla/core';

export interface RemoteSessionClientOptions {
  backend: SessionBackendPort;
  /** Upper bound for one remote call; exceeding it is reported as Unreachable. */
  callTimeoutMs: number;
  logger?: Logger;
  telemetry?: TelemetrySinkPort;
}

/**
 * Single-attempt access to the agent backend with a timeout on every call and
 * every failure normalized into the SessionError taxonomy. Retrying and
 * admission control happen a layer above, in SessionCallRunner.
 */
export class RemoteSessionClient {
  private readonly backend: SessionBackendPort;
  private readonly callTimeoutMs: number;
  private readonly logger: Logger | undefined;
  private readonly telemetry: TelemetrySinkPort | undefined;
  private readonly issuedIds = new Set<string>();

  public constructor(options: RemoteSessionClientOptions) {
    if (!Number.isInteger(options.callTimeoutMs) || options.callTimeoutMs <= 0) {
      throw new RangeError(`callTimeoutMs must be a positive integer, got ${options.callTimeoutMs}`);
    }
    this.backend = options.backend;
    this.callTimeoutMs = options.callTimeoutMs;
    this.logger = options.logger?.child({ component: 'remote-session-client' });
    this.telemetry = options.telemetry;
  }

  public async createSession(agentId: string, initialState: SessionState = {}): Promise<Session> {
    const parsed = createSessionRequestSchema.safeParse({ agentId, state: initialState });
    if (!parsed.success) {
      throw new InvalidRequestError(`Invalid create-session request: ${formatIssues(parsed.error)}`);
    }
    const request = parsed.data;

    const created = await this.invoke('create', undefined, (signal) =>
      this.backend.createSession(request, { signal })
    );

    if (this.issuedIds.has(created.sessionId)) {
      throw new RemoteError(`Backend returned an already issued session id: ${created.sessionId}`);
    }
    this.issuedIds.add(created.sessionId);

    return {
      id: created.sessionId,
      agentId: request.agentId,
      state: created.state ?? { ...request.state },
      createdAt: new Date(),
      stale: false,
    };
  }

  public async sendMessage(sessionId: string, text: string): Promise<MessageReply> {
    const parsed = sendMessageRequestSchema.safeParse({ sessionId, text });
    if (!parsed.success) {
      throw new InvalidRequestError(`Invalid send-message request: ${formatIssues(parsed.error)}`);
    }
    const request = parsed.data;

    return this.invoke('message', request.sessionId, (signal) =>
      this.backend.sendMessage(request, { signal })
    );
  }

  /** Idempotent: an id the backend does not know is already deleted. */
  public async deleteSession(sessionId: string): Promise<void> {
    const id = this.requireSessionId(sessionId);
    try {
      await this.invoke('delete', id, (signal) => this.backend.deleteSession(id, { signal }));
    } catch (error) {
      if (error instanceof SessionNotFoundError) {
        this.logger?.debug({ sessionId: id }, 'Session already absent on delete');
        return;
      }
      throw error;
    }
  }

  public async listSessions(agentId?: string): Promise<SessionSummary[]> {
    const sessions = await this.invoke('list', undefined, (signal) => this.backend.listSessions({ signal }));
    return agentId === undefined ? sessions : sessions.filter((session) => session.agentId === agentId);
  }

  public async getSession(sessionId: string): Promise<SessionSummary> {
    const id = this.requireSessionId(sessionId);
    return this.invoke('get', id, (signal) => this.backend.getSession(id, { signal }));
  }

  /** Link that opens the session in the backend's own web UI. */
  public chatUrl(sessionId: string): string {
    return `${this.backend.baseUrl.replace(/\/+$/, '')}/?session=${encodeURIComponent(sessionId)}`;
  }

  private requireSessionId(sessionId: string): string {
    const parsed = sessionIdSchema.safeParse(sessionId);
    if (!parsed.success) {
      throw new InvalidRequestError(`Invalid session id: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  private async invoke<T>(
    operation: RemoteOperation,
    sessionId: string | undefined,
    run: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await withTimeout({
        timeoutMs: this.callTimeoutMs,
        label: `${operation} call`,
        run,
      });
      this.record(operation, sessionId, startedAt, null);
      return result;
    } catch (error) {
      const normalized = normalizeError(error);
      this.record(operation, sessionId, startedAt, normalized);
      throw normalized;
    }
  }

  private record(
    operation: RemoteOperation,
    sessionId: string | undefined,
    startedAt: number,
    error: SessionError | null
  ): void {
    const durationMs = Math.max(0, Date.now() - startedAt);
    this.logger?.debug(
      { operation, sessionId, durationMs, result: error ? 'error' : 'ok', errorCode: error?.kind },
      'Remote call finished'
    );
    this.telemetry?.emit({
      operation,
      durationMs,
      result: error ? 'error' : 'ok',
      timestamp: new Date(),
      ...(sessionId !== undefined && { sessionId }),
      ...(error && { errorCode: error.kind }),
    });
  }
}

function normalizeError(error: unknown): SessionError {
  if (isSessionError(error)) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return new UnreachableError(error.message, { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new RemoteError(`Unexpected backend failure: ${reason}`);
}
