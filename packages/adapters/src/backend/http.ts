import { z } from 'zod';
import {
    type BackendCallOptions,
    type MessageReply,
    type SessionBackendPort,
    type SessionState,
    type SessionSummary,
    InvalidRequestError,
    RemoteError,
    SessionNotFoundError,
    UnreachableError,
    sessionStateSchema
} from '@flotilla/core';

const createResponseSchema = z.object({
    session_id: z.string().min(1),
    state: sessionStateSchema.optional()
});

const messageResponseSchema = z.object({
    response: z.string().optional(),
    text: z.string().optional(),
    state: sessionStateSchema.optional()
});

const sessionRecordSchema = z
    .object({
        session_id: z.string().min(1).optional(),
        id: z.string().min(1).optional(),
        agent_id: z.string().optional(),
        state: sessionStateSchema.optional(),
        created_at: z.string().optional()
    })
    .refine((record) => record.session_id !== undefined || record.id !== undefined, {
        message: 'session record has neither session_id nor id'
    });

const listResponseSchema = z.object({
    sessions: z.array(sessionRecordSchema).default([])
});

type SessionRecord = z.infer<typeof sessionRecordSchema>;

export interface HttpSessionBackendOptions {
    baseUrl: string;
    /** Extra headers sent with every request (e.g. authorization). */
    headers?: Record<string, string>;
    fetch?: typeof fetch;
}

interface RequestInput {
    method: 'GET' | 'POST' | 'DELETE';
    path: string;
    action: string;
    body?: unknown;
    /** Set on session-scoped routes so a 404 maps to SessionNotFoundError. */
    sessionId?: string;
    signal?: AbortSignal | undefined;
}

/**
 * Talks to the agent web server over JSON/HTTP.
 *
 *   POST   /sessions       { agent_id, state }       → { session_id }
 *   POST   /chat           { session_id, message }   → { response } | { text }
 *   DELETE /sessions/:id
 *   GET    /sessions                                 → { sessions: [...] }
 *   GET    /sessions/:id
 */
export class HttpSessionBackend implements SessionBackendPort {
    public readonly baseUrl: string;
    private readonly headers: Record<string, string>;
    private readonly fetchImpl: typeof fetch;

    public constructor(options: HttpSessionBackendOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.headers = options.headers ?? {};
        this.fetchImpl = options.fetch ?? fetch;
    }

    public async createSession(
        input: { agentId: string; state: SessionState },
        options?: BackendCallOptions
    ): Promise<{ sessionId: string; state?: SessionState }> {
        const data = await this.request({
            method: 'POST',
            path: '/sessions',
            action: 'create session',
            body: { agent_id: input.agentId, state: input.state },
            signal: options?.signal
        });
        const parsed = this.parse(createResponseSchema, data, 'create session');
        return parsed.state === undefined
            ? { sessionId: parsed.session_id }
            : { sessionId: parsed.session_id, state: parsed.state };
    }

    public async sendMessage(
        input: { sessionId: string; text: string },
        options?: BackendCallOptions
    ): Promise<MessageReply> {
        const data = await this.request({
            method: 'POST',
            path: '/chat',
            action: 'send message',
            body: { session_id: input.sessionId, message: input.text },
            sessionId: input.sessionId,
            signal: options?.signal
        });
        const parsed = this.parse(messageResponseSchema, data, 'send message');
        const reply: MessageReply = { text: parsed.response ?? parsed.text ?? '' };
        if (parsed.state !== undefined) {
            reply.state = parsed.state;
        }
        return reply;
    }

    public async deleteSession(sessionId: string, options?: BackendCallOptions): Promise<void> {
        await this.request({
            method: 'DELETE',
            path: `/sessions/${encodeURIComponent(sessionId)}`,
            action: 'delete session',
            sessionId,
            signal: options?.signal
        });
    }

    public async listSessions(options?: BackendCallOptions): Promise<SessionSummary[]> {
        const data = await this.request({
            method: 'GET',
            path: '/sessions',
            action: 'list sessions',
            signal: options?.signal
        });
        return this.parse(listResponseSchema, data, 'list sessions').sessions.map(toSummary);
    }

    public async getSession(sessionId: string, options?: BackendCallOptions): Promise<SessionSummary> {
        const data = await this.request({
            method: 'GET',
            path: `/sessions/${encodeURIComponent(sessionId)}`,
            action: 'get session',
            sessionId,
            signal: options?.signal
        });
        return toSummary(this.parse(sessionRecordSchema, data, 'get session'));
    }

    private async request(input: RequestInput): Promise<unknown> {
        const headers: Record<string, string> = { accept: 'application/json', ...this.headers };
        const init: RequestInit = { method: input.method, headers };
        if (input.body !== undefined) {
            headers['content-type'] = 'application/json';
            init.body = JSON.stringify(input.body);
        }
        if (input.signal) {
            init.signal = input.signal;
        }

        let response: Response;
        try {
            response = await this.fetchImpl(`${this.baseUrl}${input.path}`, init);
        } catch (error) {
            if (input.signal?.aborted) {
                throw new UnreachableError(`Request to ${input.action} was aborted`, { cause: error });
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new UnreachableError(`Cannot connect to agent backend at ${this.baseUrl}: ${reason}`, { cause: error });
        }

        const text = await response.text();

        if (!response.ok) {
            if (response.status === 404 && input.sessionId !== undefined) {
                throw new SessionNotFoundError(input.sessionId);
            }
            if (response.status === 400 || response.status === 422) {
                throw new InvalidRequestError(`Failed to ${input.action}: ${response.status} - ${text}`);
            }
            throw new RemoteError(`Failed to ${input.action}: ${response.status} - ${text}`, response.status);
        }

        if (!text.trim()) {
            return {};
        }
        try {
            return JSON.parse(text);
        } catch {
            throw new RemoteError(`Failed to ${input.action}: response body is not JSON`, response.status);
        }
    }

    private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, action: string): T {
        const result = schema.safeParse(data);
        if (!result.success) {
            const detail = result.error.issues.map((issue) => issue.message).join('; ');
            throw new RemoteError(`Failed to ${action}: unexpected response shape (${detail})`);
        }
        return result.data;
    }
}

function toSummary(record: SessionRecord): SessionSummary {
    const summary: SessionSummary = {
        id: record.session_id ?? record.id ?? '',
        agentId: record.agent_id ?? '',
        state: record.state ?? {}
    };
    if (record.created_at !== undefined) {
        const createdAt = new Date(record.created_at);
        if (!Number.isNaN(createdAt.getTime())) {
            summary.createdAt = createdAt;
        }
    }
    return summary;
}
