/**
 * Strict JSON-serializable value type.
 * Session state is restricted to these values so every cached view can be
 * sent back to the backend verbatim (no functions, classes, Maps, Sets, etc.).
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type SessionState = Record<string, JsonValue>;

export interface Session {
  /** Opaque identifier handed out by the backend. Never changes. */
  readonly id: string;
  readonly agentId: string;
  /**
   * Last-known server view of the session state. Replaced only with state the
   * backend returned; never edited locally.
   */
  state: SessionState;
  readonly createdAt: Date;
  /** Set once any call on this session has failed; the cached state may be out of date. */
  stale: boolean;
  /** Index of the owning pool slot, when the session belongs to a pool. */
  slotIndex?: number;
}

export interface MessageReply {
  text: string;
  /** Session state echoed back by the backend, when it sends one. */
  state?: SessionState;
}

export interface SessionSummary {
  id: string;
  agentId: string;
  state: SessionState;
  createdAt?: Date;
}
