/**
 * Default constants for Flotilla orchestration
 */

/**
 * Backend Connection
 */
export const BACKEND_DEFAULTS = {
  /** Address of the agent web server */
  BASE_URL: "http://localhost:8000" as const,

  /** Agent used when a caller does not name one */
  AGENT_ID: "dynamic_session_agent" as const,

  /** Per-call timeout in milliseconds; exceeding it counts as Unreachable */
  CALL_TIMEOUT_MS: 30_000 as const,
};

/**
 * Retry Executor
 */
export const RETRY_DEFAULTS = {
  MAX_ATTEMPTS: 3 as const,
  BASE_DELAY_MS: 50 as const,
  MULTIPLIER: 2 as const,
  MAX_DELAY_MS: 2_000 as const,
  JITTER_MS: 0 as const,
};

/**
 * Concurrency Limiter and Session Pool
 */
export const CAPACITY_DEFAULTS = {
  /** Maximum in-flight remote calls */
  CONCURRENCY: 16 as const,

  /** Pre-created sessions held by the pool */
  POOL_CAPACITY: 8 as const,
};

/**
 * Logging Configuration
 */
export const LOGGING_DEFAULTS = {
  LEVEL: "info" as const,

  /** Whether to pretty-print logs (enabled in non-production) */
  PRETTY_PRINT: process.env.NODE_ENV !== "production",
} as const;
