import { type BatchReport, type SessionState, type WorkItem } from '@flotilla/core';

/** One create item per state; keys default to the item index. */
export function createSessionsItems(
  agentId: string,
  states: readonly SessionState[],
  keyOf?: (state: SessionState, index: number) => string
): WorkItem[] {
  return states.map((initialState, index): WorkItem => ({
    kind: 'create',
    agentId,
    initialState,
    ...(keyOf && { key: keyOf(initialState, index) }),
  }));
}

/** The same message to every session, keyed by session id. */
export function broadcastItems(sessionIds: readonly string[], text: string): WorkItem[] {
  return sessionIds.map((sessionId): WorkItem => ({ kind: 'message', sessionId, text, key: sessionId }));
}

export function deleteItems(sessionIds: readonly string[]): WorkItem[] {
  return sessionIds.map((sessionId): WorkItem => ({ kind: 'delete', sessionId, key: sessionId }));
}

export interface FailureReason {
  index: number;
  key: string;
  kind: string;
  message: string;
}

export function failureReasons(report: BatchReport): FailureReason[] {
  const reasons: FailureReason[] = [];
  for (const outcome of report.outcomes) {
    if (outcome.status === 'failed') {
      reasons.push({ index: outcome.index, key: outcome.key, ...outcome.error });
    }
  }
  return reasons;
}
