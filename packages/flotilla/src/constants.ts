/**
 * Default constants for Flotilla configuration
 */
import {
  BACKEND_DEFAULTS,
  CAPACITY_DEFAULTS,
  LOGGING_DEFAULTS,
  RETRY_DEFAULTS,
  type LogLevel,
} from "@flotilla/core";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const satisfies readonly LogLevel[];

/**
 * Values applied to every setting a FlotillaConfig leaves out.
 * `pool.acquireTimeoutMs` has no default: acquire() waits indefinitely.
 */
export const ORCHESTRATOR_DEFAULTS = {
  baseUrl: BACKEND_DEFAULTS.BASE_URL,
  agentId: BACKEND_DEFAULTS.AGENT_ID,
  callTimeoutMs: BACKEND_DEFAULTS.CALL_TIMEOUT_MS,
  retry: {
    maxAttempts: RETRY_DEFAULTS.MAX_ATTEMPTS,
    baseDelayMs: RETRY_DEFAULTS.BASE_DELAY_MS,
    multiplier: RETRY_DEFAULTS.MULTIPLIER,
    maxDelayMs: RETRY_DEFAULTS.MAX_DELAY_MS,
    jitterMs: RETRY_DEFAULTS.JITTER_MS,
  },
  concurrency: CAPACITY_DEFAULTS.CONCURRENCY,
  pool: {
    capacity: CAPACITY_DEFAULTS.POOL_CAPACITY,
    warmOnStart: false,
  },
  logging: {
    level: LOGGING_DEFAULTS.LEVEL,
    prettyPrint: LOGGING_DEFAULTS.PRETTY_PRINT,
  },
} as const;
