import { randomUUID } from 'node:crypto';
import {
    type BackendCallOptions,
    type MessageReply,
    type RemoteOperation,
    type SessionBackendPort,
    type SessionState,
    type SessionSummary,
    SessionNotFoundError,
    UnreachableError
} from '@flotilla/core';

export interface FakeBackendCall {
    operation: RemoteOperation;
    sessionId?: string;
    agentId?: string;
    text?: string;
}

export interface FakeFailureRule {
    /** Restrict the rule to one operation; omitted means every operation. */
    operation?: RemoteOperation;
    /** Extra filter on the call; omitted means every matching operation. */
    when?: (call: FakeBackendCall) => boolean;
    /** How many matching calls fail before the rule expires; omitted means forever. */
    times?: number;
    error: Error | (() => Error);
}

interface StoredSession {
    agentId: string;
    state: SessionState;
    createdAt: Date;
    messages: string[];
}

export interface FakeSessionBackendOptions {
    /** Fixed latency or a per-call latency function, in milliseconds. */
    latencyMs?: number | ((call: FakeBackendCall) => number);
    idFactory?: () => string;
    /** Builds the reply for sendMessage; defaults to `ack:<text>` without state. */
    onMessage?: (session: SessionSummary, text: string) => MessageReply;
}

/**
 * In-process stand-in for the agent backend.
 * Records every call, tracks peak concurrency, and fails calls according to
 * the rules registered through fail()/failNext().
 */
export class FakeSessionBackend implements SessionBackendPort {
    public readonly baseUrl = 'http://fake-backend.local';
    public readonly calls: FakeBackendCall[] = [];
    public inFlight = 0;
    public peakInFlight = 0;

    private readonly sessions = new Map<string, StoredSession>();
    private readonly rules: Array<FakeFailureRule & { remaining: number }> = [];
    private readonly options: FakeSessionBackendOptions;

    public constructor(options: FakeSessionBackendOptions = {}) {
        this.options = options;
    }

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public fail(rule: FakeFailureRule): void {
        this.rules.push({ ...rule, remaining: rule.times ?? Number.POSITIVE_INFINITY });
    }

    public failNext(operation: RemoteOperation, error: Error | (() => Error), times = 1): void {
        this.fail({ operation, error, times });
    }

    public clearFailures(): void {
        this.rules.length = 0;
    }

    public callCount(operation?: RemoteOperation): number {
        return operation === undefined
            ? this.calls.length
            : this.calls.filter((call) => call.operation === operation).length;
    }

    public has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    public get sessionCount(): number {
        return this.sessions.size;
    }

    /** Puts a session straight into the store, bypassing failure rules. */
    public seed(sessionId: string, agentId: string, state: SessionState = {}): void {
        this.sessions.set(sessionId, { agentId, state: { ...state }, createdAt: new Date(), messages: [] });
    }

    public messagesOf(sessionId: string): string[] {
        return [...(this.sessions.get(sessionId)?.messages ?? [])];
    }

    public async createSession(
        input: { agentId: string; state: SessionState },
        options?: BackendCallOptions
    ): Promise<{ sessionId: string; state?: SessionState }> {
        return this.call({ operation: 'create', agentId: input.agentId }, options, () => {
            const sessionId = this.options.idFactory?.() ?? randomUUID();
            this.sessions.set(sessionId, {
                agentId: input.agentId,
                state: { ...input.state },
                createdAt: new Date(),
                messages: []
            });
            return { sessionId, state: { ...input.state } };
        });
    }

    public async sendMessage(
        input: { sessionId: string; text: string },
        options?: BackendCallOptions
    ): Promise<MessageReply> {
        return this.call({ operation: 'message', sessionId: input.sessionId, text: input.text }, options, () => {
            const stored = this.require(input.sessionId);
            stored.messages.push(input.text);
            const reply = this.options.onMessage?.(summarize(input.sessionId, stored), input.text)
                ?? { text: `ack:${input.text}` };
            if (reply.state !== undefined) {
                stored.state = { ...reply.state };
            }
            return reply;
        });
    }

    public async deleteSession(sessionId: string, options?: BackendCallOptions): Promise<void> {
        return this.call({ operation: 'delete', sessionId }, options, () => {
            this.require(sessionId);
            this.sessions.delete(sessionId);
        });
    }

    public async listSessions(options?: BackendCallOptions): Promise<SessionSummary[]> {
        return this.call({ operation: 'list' }, options, () =>
            [...this.sessions.entries()].map(([id, stored]) => summarize(id, stored))
        );
    }

    public async getSession(sessionId: string, options?: BackendCallOptions): Promise<SessionSummary> {
        return this.call({ operation: 'get', sessionId }, options, () => summarize(sessionId, this.require(sessionId)));
    }

    private async call<T>(call: FakeBackendCall, options: BackendCallOptions | undefined, run: () => T): Promise<T> {
        this.calls.push(call);
        this.inFlight += 1;
        this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
        try {
            const latency = typeof this.options.latencyMs === 'function'
                ? this.options.latencyMs(call)
                : this.options.latencyMs ?? 0;
            if (latency > 0) {
                await delay(latency, options?.signal);
            }
            const failure = this.takeFailure(call);
            if (failure) {
                throw failure;
            }
            return run();
        } finally {
            this.inFlight -= 1;
        }
    }

    private takeFailure(call: FakeBackendCall): Error | null {
        for (const rule of this.rules) {
            if (rule.remaining <= 0) continue;
            if (rule.operation !== undefined && rule.operation !== call.operation) continue;
            if (rule.when && !rule.when(call)) continue;
            rule.remaining -= 1;
            return typeof rule.error === 'function' ? rule.error() : rule.error;
        }
        return null;
    }

    private require(sessionId: string): StoredSession {
        const stored = this.sessions.get(sessionId);
        if (!stored) {
            throw new SessionNotFoundError(sessionId);
        }
        return stored;
    }
}

function summarize(id: string, stored: StoredSession): SessionSummary {
    return { id, agentId: stored.agentId, state: { ...stored.state }, createdAt: stored.createdAt };
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new UnreachableError('Request aborted'));
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new UnreachableError('Request aborted'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
