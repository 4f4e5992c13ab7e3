import { type Router } from 'express';
import { createFlotillaApi } from '@flotilla/api';
import { SessionOrchestrator } from '@flotilla/runtime';

import { type FlotillaConfig, resolveFlotillaConfig } from './config';
import { applyDefaultProviders } from './resources';

/**
 * Resolves and validates `config`, fills in default providers and returns a
 * ready-to-start orchestrator. Nothing touches the backend until start().
 */
export function createFlotilla(config: FlotillaConfig = {}): SessionOrchestrator {
  const resolved = resolveFlotillaConfig(config);
  const resources = applyDefaultProviders(resolved, config.providers, config.headers);

  return new SessionOrchestrator({
    config: resolved,
    resources,
    ...(config.poolInitialState !== undefined && { poolInitialState: config.poolInitialState }),
  });
}

export interface InspectionRouterOptions {
  authToken?: string;
}

/** Mounts the read-only inspection endpoints for one orchestrator. */
export function createInspectionRouter(
  flotilla: SessionOrchestrator,
  options: InspectionRouterOptions = {},
): Router {
  return createFlotillaApi({
    ...(options.authToken !== undefined && { authToken: options.authToken }),
    getAgentId: () => flotilla.agentId,
    poolStats: () => flotilla.pool.stats(),
    listSessions: (agentId) => flotilla.listSessions(agentId),
  });
}
