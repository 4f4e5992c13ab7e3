import {
  type BatchReport,
  type Logger,
  type WorkItem,
  type WorkOutcome,
  type WorkResult,
  CancelledError,
  describeError,
} from '@flotilla/core';

import { type SessionCallRunner } from '../calls/sessionCallRunner';

export interface BatchOrchestratorOptions {
  calls: SessionCallRunner;
  logger?: Logger;
}

export interface RunBatchOptions {
  /** Once aborted, items not yet admitted through the limiter are skipped. */
  signal?: AbortSignal;
}

/**
 * Fans a batch of work items out over the call runner. Partial failure is the
 * normal case: every item ends in its own outcome and no failure stops its
 * siblings.
 */
export class BatchOrchestrator {
  private readonly calls: SessionCallRunner;
  private readonly logger: Logger | undefined;

  public constructor(options: BatchOrchestratorOptions) {
    this.calls = options.calls;
    this.logger = options.logger?.child({ component: 'batch-orchestrator' });
  }

  public async runBatch(items: readonly WorkItem[], options: RunBatchOptions = {}): Promise<BatchReport> {
    const startedAt = Date.now();
    const outcomes = await Promise.all(items.map((item, index) => this.runItem(item, index, options.signal)));

    const report: BatchReport = {
      outcomes,
      succeeded: outcomes.filter((outcome) => outcome.status === 'succeeded').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length,
      skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
      durationMs: Math.max(0, Date.now() - startedAt),
    };

    this.logger?.info(
      {
        items: items.length,
        succeeded: report.succeeded,
        failed: report.failed,
        skipped: report.skipped,
        durationMs: report.durationMs,
      },
      'Batch completed'
    );
    return report;
  }

  private async runItem(item: WorkItem, index: number, signal: AbortSignal | undefined): Promise<WorkOutcome> {
    const key = item.key ?? String(index);
    try {
      const result = await this.perform(item, signal);
      return { index, key, item, status: 'succeeded', result };
    } catch (error) {
      if (error instanceof CancelledError) {
        return { index, key, item, status: 'skipped', reason: 'cancelled' };
      }
      const failure = describeError(error);
      this.logger?.warn({ index, key, operation: item.kind, ...failure }, 'Batch item failed');
      return { index, key, item, status: 'failed', error: failure };
    }
  }

  private async perform(item: WorkItem, signal: AbortSignal | undefined): Promise<WorkResult> {
    switch (item.kind) {
      case 'create': {
        const session = await this.calls.createSession(item.agentId, item.initialState, signal);
        return { kind: 'create', session };
      }
      case 'message': {
        const reply = await this.calls.sendMessage(item.sessionId, item.text, signal);
        return { kind: 'message', sessionId: item.sessionId, reply: reply.text };
      }
      case 'delete': {
        await this.calls.deleteSession(item.sessionId, signal);
        return { kind: 'delete', sessionId: item.sessionId };
      }
    }
  }
}
