import { type RuntimeResource } from "../lifecycle";
import { type MessageReply, type SessionState, type SessionSummary } from "../entities/session";

export interface BackendCallOptions {
  /** Aborted by the client when the per-call timeout elapses. */
  signal?: AbortSignal;
}

/**
 * Transport-level contract of the remote agent service.
 *
 * Implementations raise the `SessionError` subclasses from `@flotilla/core`
 * for failures they can classify (404 → SessionNotFoundError, 4xx validation
 * → InvalidRequestError, other non-2xx → RemoteError, connection failures →
 * UnreachableError). Anything else is normalized by the RemoteSessionClient.
 */
export interface SessionBackendPort extends RuntimeResource {
  /** Base address used to build links into the backend's own web UI. */
  readonly baseUrl: string;
  createSession(
    input: { agentId: string; state: SessionState },
    options?: BackendCallOptions
  ): Promise<{ sessionId: string; state?: SessionState }>;
  sendMessage(
    input: { sessionId: string; text: string },
    options?: BackendCallOptions
  ): Promise<MessageReply>;
  /** Must raise SessionNotFoundError for unknown ids; the client treats it as success. */
  deleteSession(sessionId: string, options?: BackendCallOptions): Promise<void>;
  listSessions(options?: BackendCallOptions): Promise<SessionSummary[]>;
  getSession(sessionId: string, options?: BackendCallOptions): Promise<SessionSummary>;
}
