import { type OrchestratorConfig } from '@flotilla/core';
import { HttpSessionBackend, PinoLogger } from '@flotilla/adapters';
import { type OrchestratorResources } from '@flotilla/runtime';

import { type FlotillaProvidersConfig } from './config';

/**
 * Fills every provider the caller left out: the HTTP backend at
 * `config.baseUrl` and a pino logger at the configured level.
 */
export function applyDefaultProviders(
  config: OrchestratorConfig,
  providers: FlotillaProvidersConfig = {},
  headers?: Record<string, string>,
): OrchestratorResources {
  const resources: OrchestratorResources = {
    backend: providers.backend ?? new HttpSessionBackend({
      baseUrl: config.baseUrl,
      ...(headers && { headers }),
    }),
    logger: providers.logger ?? new PinoLogger({
      level: config.logging.level,
      prettyPrint: config.logging.prettyPrint,
      name: 'flotilla',
    }),
  };
  if (providers.telemetry) {
    resources.telemetry = providers.telemetry;
  }
  return resources;
}
