export type {
  Session,
  SessionState,
  SessionSummary,
  MessageReply,
  WorkItem,
  WorkOutcome,
  BatchReport,
  PoolStats,
  PoolInitReport,
  PoolDrainReport,
  OrchestratorConfig,
  SessionBackendPort,
  Logger,
  TelemetrySinkPort,
} from '@flotilla/core';
export {
  SessionError,
  UnreachableError,
  RemoteError,
  InvalidRequestError,
  SessionNotFoundError,
  PoolExhaustedError,
  InvalidReleaseError,
  CancelledError,
  describeError,
} from '@flotilla/core';
export {
  SessionOrchestrator,
  createSessionsItems,
  broadcastItems,
  deleteItems,
  failureReasons,
} from '@flotilla/runtime';

export * from './constants';
export { resolveFlotillaConfig, type FlotillaConfig, type FlotillaProvidersConfig } from './api/config';
export * from './api/env';
export * from './api/resources';
export * from './api/createFlotilla';
