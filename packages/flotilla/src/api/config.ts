import { z } from 'zod';
import {
  type LogLevel,
  type OrchestratorConfig,
  type PoolConfig,
  type RetryConfig,
  type SessionState,
  formatIssues,
} from '@flotilla/core';
import { type OrchestratorResources } from '@flotilla/runtime';

import { LOG_LEVELS, ORCHESTRATOR_DEFAULTS } from '../constants';

export type FlotillaProvidersConfig = Partial<OrchestratorResources>;

export interface FlotillaConfig {
  baseUrl?          : string;
  agentId?          : string;
  callTimeoutMs?    : number;
  retry?            : Partial<RetryConfig>;
  concurrency?      : number;
  pool?             : Partial<PoolConfig>;
  logging?          : { level?: LogLevel; prettyPrint?: boolean };
  /** Extra headers sent with every backend request. */
  headers?          : Record<string, string>;
  poolInitialState? : SessionState | ((slot: number) => SessionState);
  providers?        : FlotillaProvidersConfig;
}

const number = (rule: string) => z.number({ invalid_type_error: 'must be a number', required_error: 'is required' }).finite(rule);
const positiveInteger = () => number('must be a positive integer').int('must be a positive integer').positive('must be a positive integer');
const nonNegativeInteger = () => number('must be a non-negative integer').int('must be a non-negative integer').nonnegative('must be a non-negative integer');

const orchestratorConfigSchema = z.object({
  baseUrl: z.string().trim().url('must be an absolute URL'),
  agentId: z.string().trim().min(1, 'must not be empty'),
  callTimeoutMs: positiveInteger(),
  retry: z.object({
    maxAttempts: positiveInteger(),
    baseDelayMs: nonNegativeInteger(),
    multiplier: number('must be at least 1').min(1, 'must be at least 1'),
    maxDelayMs: nonNegativeInteger(),
    jitterMs: nonNegativeInteger(),
  }),
  concurrency: positiveInteger(),
  pool: z.object({
    capacity: positiveInteger(),
    acquireTimeoutMs: positiveInteger().optional(),
    warmOnStart: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    prettyPrint: z.boolean(),
  }),
});

/** Applies defaults to every omitted setting and validates the result. */
export function resolveFlotillaConfig(config: FlotillaConfig = {}): OrchestratorConfig {
  const merged = {
    baseUrl       : config.baseUrl       ?? ORCHESTRATOR_DEFAULTS.baseUrl,
    agentId       : config.agentId       ?? ORCHESTRATOR_DEFAULTS.agentId,
    callTimeoutMs : config.callTimeoutMs ?? ORCHESTRATOR_DEFAULTS.callTimeoutMs,
    retry         : { ...ORCHESTRATOR_DEFAULTS.retry, ...stripUndefined(config.retry) },
    concurrency   : config.concurrency   ?? ORCHESTRATOR_DEFAULTS.concurrency,
    pool          : { ...ORCHESTRATOR_DEFAULTS.pool, ...stripUndefined(config.pool) },
    logging       : { ...ORCHESTRATOR_DEFAULTS.logging, ...stripUndefined(config.logging) },
  };

  const result = orchestratorConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new Error(`Invalid flotilla config: ${formatIssues(result.error)}`);
  }

  const resolved: OrchestratorConfig = {
    ...result.data,
    baseUrl: result.data.baseUrl.replace(/\/+$/, ''),
    pool: { capacity: result.data.pool.capacity, warmOnStart: result.data.pool.warmOnStart },
  };
  if (result.data.pool.acquireTimeoutMs !== undefined) {
    resolved.pool.acquireTimeoutMs = result.data.pool.acquireTimeoutMs;
  }
  return resolved;
}

function stripUndefined<T extends object>(value: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!value) return result;
  for (const key of Object.keys(value)) {
    if (isKeyOf(value, key) && value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
  return key in value;
}

export const __private = {
  orchestratorConfigSchema,
  stripUndefined,
};
