import { z } from 'zod';
import { formatIssues } from '@flotilla/core';

import { LOG_LEVELS } from '../constants';
import { type FlotillaConfig } from './config';

/** Unset or blank variables fall back to the defaults. */
const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);
const optionalNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.coerce.number({ invalid_type_error: 'must be a number' }).optional()
);
const optionalFlag = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
  z
    .enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'must be true, false, 1 or 0' }) })
    .transform((value) => value === 'true' || value === '1')
    .optional()
);

const envSchema = z.object({
  FLOTILLA_BASE_URL                : optionalText,
  FLOTILLA_AGENT_ID                : optionalText,
  FLOTILLA_CALL_TIMEOUT_MS         : optionalNumber,
  FLOTILLA_RETRY_MAX_ATTEMPTS      : optionalNumber,
  FLOTILLA_RETRY_BASE_DELAY_MS     : optionalNumber,
  FLOTILLA_RETRY_MULTIPLIER        : optionalNumber,
  FLOTILLA_RETRY_MAX_DELAY_MS      : optionalNumber,
  FLOTILLA_RETRY_JITTER_MS         : optionalNumber,
  FLOTILLA_CONCURRENCY             : optionalNumber,
  FLOTILLA_POOL_CAPACITY           : optionalNumber,
  FLOTILLA_POOL_ACQUIRE_TIMEOUT_MS : optionalNumber,
  FLOTILLA_POOL_WARM_ON_START      : optionalFlag,
  FLOTILLA_LOG_LEVEL               : z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
    z.enum(LOG_LEVELS).optional()
  ),
  FLOTILLA_LOG_PRETTY              : optionalFlag,
});

/**
 * Reads FLOTILLA_* variables into a partial config. Only variables that are
 * set appear in the result, so it can be spread under explicit settings.
 */
export function loadFlotillaConfigFromEnv(env: NodeJS.ProcessEnv = process.env): FlotillaConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid flotilla config: ${formatIssues(result.error)}`);
  }
  const vars = result.data;

  const config: FlotillaConfig = {};
  if (vars.FLOTILLA_BASE_URL !== undefined) config.baseUrl = vars.FLOTILLA_BASE_URL;
  if (vars.FLOTILLA_AGENT_ID !== undefined) config.agentId = vars.FLOTILLA_AGENT_ID;
  if (vars.FLOTILLA_CALL_TIMEOUT_MS !== undefined) config.callTimeoutMs = vars.FLOTILLA_CALL_TIMEOUT_MS;
  if (vars.FLOTILLA_CONCURRENCY !== undefined) config.concurrency = vars.FLOTILLA_CONCURRENCY;

  const retry: NonNullable<FlotillaConfig['retry']> = {};
  if (vars.FLOTILLA_RETRY_MAX_ATTEMPTS !== undefined) retry.maxAttempts = vars.FLOTILLA_RETRY_MAX_ATTEMPTS;
  if (vars.FLOTILLA_RETRY_BASE_DELAY_MS !== undefined) retry.baseDelayMs = vars.FLOTILLA_RETRY_BASE_DELAY_MS;
  if (vars.FLOTILLA_RETRY_MULTIPLIER !== undefined) retry.multiplier = vars.FLOTILLA_RETRY_MULTIPLIER;
  if (vars.FLOTILLA_RETRY_MAX_DELAY_MS !== undefined) retry.maxDelayMs = vars.FLOTILLA_RETRY_MAX_DELAY_MS;
  if (vars.FLOTILLA_RETRY_JITTER_MS !== undefined) retry.jitterMs = vars.FLOTILLA_RETRY_JITTER_MS;
  if (Object.keys(retry).length > 0) config.retry = retry;

  const pool: NonNullable<FlotillaConfig['pool']> = {};
  if (vars.FLOTILLA_POOL_CAPACITY !== undefined) pool.capacity = vars.FLOTILLA_POOL_CAPACITY;
  if (vars.FLOTILLA_POOL_ACQUIRE_TIMEOUT_MS !== undefined) pool.acquireTimeoutMs = vars.FLOTILLA_POOL_ACQUIRE_TIMEOUT_MS;
  if (vars.FLOTILLA_POOL_WARM_ON_START !== undefined) pool.warmOnStart = vars.FLOTILLA_POOL_WARM_ON_START;
  if (Object.keys(pool).length > 0) config.pool = pool;

  const logging: NonNullable<FlotillaConfig['logging']> = {};
  if (vars.FLOTILLA_LOG_LEVEL !== undefined) logging.level = vars.FLOTILLA_LOG_LEVEL;
  if (vars.FLOTILLA_LOG_PRETTY !== undefined) logging.prettyPrint = vars.FLOTILLA_LOG_PRETTY;
  if (Object.keys(logging).length > 0) config.logging = logging;

  return config;
}
