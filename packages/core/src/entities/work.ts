import type { Session, SessionState } from './session';

export type WorkItem =
  | { kind: 'create'; agentId: string; initialState: SessionState; key?: string }
  | { kind: 'message'; sessionId: string; text: string; key?: string }
  | { kind: 'delete'; sessionId: string; key?: string };

export type WorkKind = WorkItem['kind'];

export type WorkResult =
  | { kind: 'create'; session: Session }
  | { kind: 'message'; sessionId: string; reply: string }
  | { kind: 'delete'; sessionId: string };

export interface FailureInfo {
  kind: string;
  message: string;
}

interface OutcomeBase {
  /** Position of the originating item in the submitted batch. */
  index: number;
  /** Caller-supplied correlation key, or the index as a string. */
  key: string;
  item: WorkItem;
}

export type WorkOutcome =
  | (OutcomeBase & { status: 'succeeded'; result: WorkResult })
  | (OutcomeBase & { status: 'failed'; error: FailureInfo })
  | (OutcomeBase & { status: 'skipped'; reason: 'cancelled' });

export interface BatchReport {
  /** One entry per submitted item, in submission order. */
  outcomes: WorkOutcome[];
  succeeded: number;
  failed: number;
  skipped: number;
  durationMs: number;
}
