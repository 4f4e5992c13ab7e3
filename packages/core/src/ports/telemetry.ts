import { type RuntimeResource } from "../lifecycle";

export type RemoteOperation = 'create' | 'message' | 'delete' | 'list' | 'get';

export interface RemoteCallEvent {
  operation: RemoteOperation;
  sessionId?: string;
  durationMs: number;
  result: 'ok' | 'error';
  errorCode?: string;
  timestamp: Date;
}

// TODO: emit() is synchronous; a sink that ships events over the network has
//       to buffer internally until we add a flush() to the lifecycle.
export interface TelemetrySinkPort extends RuntimeResource {
  emit(event: RemoteCallEvent): void;
}
