import { Router, type NextFunction, type Request, type Response } from 'express';
import { type PoolStats, type SessionSummary, describeError } from '@flotilla/core';

export interface FlotillaApiOptions {
    /** Optional static auth token. Clients must provide it for everything except /health. */
    authToken?: string;
    /** Agent that sessions are created for by default. */
    getAgentId: () => string;
    poolStats: () => PoolStats;
    listSessions: (agentId?: string) => Promise<SessionSummary[]>;
}

/**
 * Creates an Express router exposing read-only inspection endpoints:
 * health, pool statistics and the backend's session listing.
 */
export function createFlotillaApi(options: FlotillaApiOptions): Router {
    const router = Router();

    const requireAuth = (req: Request, res: Response, next: NextFunction) => {
        if (!options.authToken) {
            return next();
        }

        const queryToken = typeof req.query.token === 'string' ? req.query.token : undefined;
        if (queryToken && queryToken === options.authToken) {
            return next();
        }

        const authHeader = req.headers.authorization?.trim();
        if (authHeader && authHeader.startsWith('Bearer ')) {
            const token = authHeader.slice('Bearer '.length);
            if (token === options.authToken) {
                return next();
            }
        }

        res.status(401).json({ status: 'error', message: 'Unauthorized' });
    };

    // Health check endpoint (always accessible)
    router.get('/health', (_req, res) => {
        res.json({
            status: 'ok',
            agentId: options.getAgentId()
        });
    });

    router.get('/pool', requireAuth, (_req, res) => {
        res.json(options.poolStats());
    });

    router.get('/sessions', requireAuth, async (req, res) => {
        const agentId = typeof req.query.agentId === 'string' && req.query.agentId.trim()
            ? req.query.agentId.trim()
            : undefined;

        try {
            const sessions = await options.listSessions(agentId);
            res.json({
                sessions: sessions.map((session) => ({
                    id: session.id,
                    agentId: session.agentId,
                    state: session.state,
                    createdAt: session.createdAt?.toISOString() ?? null
                }))
            });
        } catch (error) {
            const { kind, message } = describeError(error);
            res.status(502).json({ error: message, kind });
        }
    });

    return router;
}
