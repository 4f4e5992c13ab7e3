import type { LogLevel } from "../ports/logger";

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface PoolConfig {
  capacity: number;
  /** Upper bound on an acquire() wait; unset means wait indefinitely. */
  acquireTimeoutMs?: number;
  /** Initialize the pool as part of SessionOrchestrator.start(). */
  warmOnStart: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  prettyPrint: boolean;
}

/** Fully resolved configuration consumed by the runtime. */
export interface OrchestratorConfig {
  baseUrl: string;
  agentId: string;
  callTimeoutMs: number;
  retry: RetryConfig;
  concurrency: number;
  pool: PoolConfig;
  logging: LoggingConfig;
}
