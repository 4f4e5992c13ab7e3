import { EventEmitter } from 'node:events';

import {
  type BatchReport,
  type MessageReply,
  type OrchestratorConfig,
  type PoolDrainReport,
  type PoolInitReport,
  type RuntimeResource,
  type Session,
  type SessionState,
  type SessionSummary,
  type WorkItem,
} from '@flotilla/core';

import { BatchOrchestrator, type RunBatchOptions } from './batch/batchOrchestrator';
import { SessionCallRunner } from './calls/sessionCallRunner';
import { RemoteSessionClient } from './client/remoteSessionClient';
import { ConcurrencyLimiter } from './limiter/concurrencyLimiter';
import { SessionPool } from './pool/sessionPool';
import { closeResources, collectLifecycleResources, startResources, type OrchestratorResources } from './resources/lifecycle';
import { RetryExecutor, type RetryNotice } from './retry/retryExecutor';

export type OrchestratorEvent = 'pool:initialized' | 'pool:drained' | 'batch:completed' | 'call:retry';

interface SessionOrchestratorInput {
  config: OrchestratorConfig;
  resources: OrchestratorResources;
  /** State sent when the pool creates a session for a slot. */
  poolInitialState?: SessionState | ((slot: number) => SessionState);
}

/**
 * Composition root: one limiter, one retry policy and one pool shared by
 * every call made through this instance.
 */
export class SessionOrchestrator {
  public readonly client: RemoteSessionClient;
  public readonly limiter: ConcurrencyLimiter;
  public readonly retry: RetryExecutor;
  public readonly calls: SessionCallRunner;
  public readonly pool: SessionPool;
  public readonly batches: BatchOrchestrator;

  private readonly emitter = new EventEmitter();
  private readonly config: OrchestratorConfig;
  private readonly resources: OrchestratorResources;
  private lifecycleResources: RuntimeResource[] = [];
  private started = false;

  public constructor(input: SessionOrchestratorInput) {
    this.config = input.config;
    this.resources = input.resources;
    const logger = input.resources.logger;

    this.client = new RemoteSessionClient({
      backend: input.resources.backend,
      callTimeoutMs: input.config.callTimeoutMs,
      logger,
      ...(input.resources.telemetry && { telemetry: input.resources.telemetry }),
    });
    this.limiter = new ConcurrencyLimiter(input.config.concurrency);
    this.retry = new RetryExecutor({
      ...input.config.retry,
      logger,
      onRetry: (notice: RetryNotice) => this.emitter.emit('call:retry', notice),
    });
    this.calls = new SessionCallRunner({ client: this.client, limiter: this.limiter, retry: this.retry });
    this.pool = new SessionPool({
      capacity: input.config.pool.capacity,
      agentId: input.config.agentId,
      calls: this.calls,
      logger,
      ...(input.poolInitialState !== undefined && { initialState: input.poolInitialState }),
      ...(input.config.pool.acquireTimeoutMs !== undefined && { acquireTimeoutMs: input.config.pool.acquireTimeoutMs }),
    });
    this.batches = new BatchOrchestrator({ calls: this.calls, logger });
  }

  /** Agent used by createSession() and the pool when none is named. */
  public get agentId(): string {
    return this.config.agentId;
  }

  public async start(): Promise<void> {
    if (this.started) return;

    this.lifecycleResources = collectLifecycleResources(this.resources);
    await startResources(this.lifecycleResources);
    this.started = true;

    this.resources.logger.info(
      {
        baseUrl: this.resources.backend.baseUrl,
        concurrency: this.limiter.capacity,
        poolCapacity: this.pool.capacity,
        maxAttempts: this.retry.policy.maxAttempts,
      },
      'Session orchestrator started'
    );

    if (this.config.pool.warmOnStart) {
      await this.initializePool();
    }
  }

  /** Drains the pool, waits for pending deletions, then closes resources. */
  public async close(): Promise<PoolDrainReport> {
    const drained = await this.drainPool();
    const retired = await this.pool.awaitRetirements();

    await closeResources(this.lifecycleResources);
    this.lifecycleResources = [];
    this.started = false;

    return { deleted: drained.deleted + retired.deleted, failed: [...drained.failed, ...retired.failed] };
  }

  public on(event: OrchestratorEvent, handler: (payload: unknown) => void): this {
    this.emitter.on(event, handler);
    return this;
  }

  public createSession(initialState: SessionState = {}, agentId: string = this.config.agentId): Promise<Session> {
    return this.calls.createSession(agentId, initialState);
  }

  public sendMessage(target: string | Session, text: string): Promise<MessageReply> {
    return this.calls.sendMessage(target, text);
  }

  public deleteSession(sessionId: string): Promise<void> {
    return this.calls.deleteSession(sessionId);
  }

  public listSessions(agentId?: string): Promise<SessionSummary[]> {
    return this.calls.listSessions(agentId);
  }

  public getSession(sessionId: string): Promise<SessionSummary> {
    return this.calls.getSession(sessionId);
  }

  public chatUrl(sessionId: string): string {
    return this.calls.chatUrl(sessionId);
  }

  public async initializePool(size?: number): Promise<PoolInitReport> {
    const report = await this.pool.initialize(size);
    this.emitter.emit('pool:initialized', report);
    return report;
  }

  public async drainPool(): Promise<PoolDrainReport> {
    const report = await this.pool.drain();
    this.emitter.emit('pool:drained', report);
    return report;
  }

  public async runBatch(items: readonly WorkItem[], options?: RunBatchOptions): Promise<BatchReport> {
    const report = await this.batches.runBatch(items, options);
    this.emitter.emit('batch:completed', report);
    return report;
  }
}
