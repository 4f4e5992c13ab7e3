export * from './sessionOrchestrator';
export * from './client/remoteSessionClient';
export * from './retry/retryExecutor';
export * from './limiter/concurrencyLimiter';
export * from './calls/sessionCallRunner';
export * from './pool/sessionPool';
export * from './batch/batchOrchestrator';
export * from './batch/items';
export * from './resources/lifecycle';
