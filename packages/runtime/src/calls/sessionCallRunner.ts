import {
  type MessageReply,
  type Session,
  type SessionState,
  type SessionSummary,
} from '@flotilla/core';

import { type RemoteSessionClient } from '../client/remoteSessionClient';
import { type ConcurrencyLimiter } from '../limiter/concurrencyLimiter';
import { type RetryExecutor } from '../retry/retryExecutor';

export interface SessionCallRunnerDeps {
  client: RemoteSessionClient;
  limiter: ConcurrencyLimiter;
  retry: RetryExecutor;
}

/**
 * The path every orchestrated remote call takes:
 * limiter slot → retry executor → remote session client → slot released.
 * The slot is held across backoff sleeps, so N bounds calls in progress,
 * not just bytes on the wire.
 */
export class SessionCallRunner {
  private readonly client: RemoteSessionClient;
  private readonly limiter: ConcurrencyLimiter;
  private readonly retry: RetryExecutor;

  public constructor(deps: SessionCallRunnerDeps) {
    this.client = deps.client;
    this.limiter = deps.limiter;
    this.retry = deps.retry;
  }

  public run<T>(label: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.limiter.run(() => this.retry.execute(call, label), signal);
  }

  public createSession(agentId: string, initialState: SessionState = {}, signal?: AbortSignal): Promise<Session> {
    return this.run('create session', () => this.client.createSession(agentId, initialState), signal);
  }

  /**
   * Sends `text` to a session. When given a Session handle, its cached state
   * is replaced with any state the backend returns, and the handle is marked
   * stale if the call fails.
   */
  public async sendMessage(target: string | Session, text: string, signal?: AbortSignal): Promise<MessageReply> {
    const sessionId = typeof target === 'string' ? target : target.id;
    try {
      const reply = await this.run('send message', () => this.client.sendMessage(sessionId, text), signal);
      if (typeof target !== 'string' && reply.state !== undefined) {
        target.state = reply.state;
        target.stale = false;
      }
      return reply;
    } catch (error) {
      if (typeof target !== 'string') {
        target.stale = true;
      }
      throw error;
    }
  }

  public deleteSession(sessionId: string, signal?: AbortSignal): Promise<void> {
    return this.run('delete session', () => this.client.deleteSession(sessionId), signal);
  }

  public listSessions(agentId?: string): Promise<SessionSummary[]> {
    return this.run('list sessions', () => this.client.listSessions(agentId));
  }

  public getSession(sessionId: string): Promise<SessionSummary> {
    return this.run('get session', () => this.client.getSession(sessionId));
  }

  public chatUrl(sessionId: string): string {
    return this.client.chatUrl(sessionId);
  }
}
