import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { type PoolStats, type SessionSummary, UnreachableError } from '@flotilla/core';
import { createFlotillaApi, type FlotillaApiOptions } from '../src/middleware';

const STATS: PoolStats = {
    capacity: 3,
    empty: 0,
    initializing: 0,
    available: 2,
    inUse: 1,
    waiting: 0,
    draining: false
};

function buildApp(overrides: Partial<FlotillaApiOptions> = {}) {
    const app = express();
    app.use('/', createFlotillaApi({
        getAgentId: () => 'agent-123',
        poolStats: () => STATS,
        listSessions: async () => [],
        ...overrides
    }));
    return app;
}

describe('Flotilla API Middleware', () => {
    it('serves /health check correctly', async () => {
        const response = await request(buildApp()).get('/health');

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: 'ok', agentId: 'agent-123' });
    });

    it('serves pool statistics', async () => {
        const response = await request(buildApp()).get('/pool');

        expect(response.status).toBe(200);
        expect(response.body).toEqual(STATS);
    });

    describe('/sessions', () => {
        it('lists sessions with ISO timestamps', async () => {
            const app = buildApp({
                listSessions: async (): Promise<SessionSummary[]> => [
                    { id: 's-1', agentId: 'agent-123', state: { turn: 2 }, createdAt: new Date('2026-01-01T00:00:00Z') },
                    { id: 's-2', agentId: 'agent-123', state: {} }
                ]
            });

            const response = await request(app).get('/sessions');

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                sessions: [
                    { id: 's-1', agentId: 'agent-123', state: { turn: 2 }, createdAt: '2026-01-01T00:00:00.000Z' },
                    { id: 's-2', agentId: 'agent-123', state: {}, createdAt: null }
                ]
            });
        });

        it('passes the agentId filter through', async () => {
            const seen: Array<string | undefined> = [];
            const app = buildApp({
                listSessions: async (agentId) => {
                    seen.push(agentId);
                    return [];
                }
            });

            await request(app).get('/sessions?agentId=other-agent');
            await request(app).get('/sessions');

            expect(seen).toEqual(['other-agent', undefined]);
        });

        it('maps backend failures to 502', async () => {
            const app = buildApp({
                listSessions: async () => {
                    throw new UnreachableError('Cannot connect to agent backend');
                }
            });

            const response = await request(app).get('/sessions');

            expect(response.status).toBe(502);
            expect(response.body).toEqual({ error: 'Cannot connect to agent backend', kind: 'Unreachable' });
        });
    });

    describe('Static Auth Token', () => {
        const app = buildApp({ authToken: 'test-secret' });

        it('keeps /health open', async () => {
            const response = await request(app).get('/health');
            expect(response.status).toBe(200);
        });

        it('denies access to /pool without token', async () => {
            const response = await request(app).get('/pool');
            expect(response.status).toBe(401);
            expect(response.body).toEqual({ status: 'error', message: 'Unauthorized' });
        });

        it('grants access with query token', async () => {
            const response = await request(app).get('/pool?token=test-secret');
            expect(response.status).toBe(200);
        });

        it('grants access with Bearer token', async () => {
            const response = await request(app)
                .get('/sessions')
                .set('Authorization', 'Bearer test-secret');

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ sessions: [] });
        });
    });
});
