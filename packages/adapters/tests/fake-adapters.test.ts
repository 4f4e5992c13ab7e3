import { describe, expect, it } from 'vitest';
import { RemoteError, SessionNotFoundError, UnreachableError } from '@flotilla/core';

import { FakeLogger, FakeSessionBackend, FakeTelemetrySink } from '../src/index';

describe('fake adapters', () => {
  describe('FakeSessionBackend', () => {
    it('stores created sessions and acknowledges messages', async () => {
      let next = 0;
      const backend = new FakeSessionBackend({ idFactory: () => `s-${++next}` });

      const created = await backend.createSession({ agentId: 'agent', state: { user_name: 'Ada' } });
      const reply = await backend.sendMessage({ sessionId: created.sessionId, text: 'hi' });

      expect(created).toEqual({ sessionId: 's-1', state: { user_name: 'Ada' } });
      expect(reply).toEqual({ text: 'ack:hi' });
      expect(backend.messagesOf('s-1')).toEqual(['hi']);
      expect(backend.callCount('create')).toBe(1);
      expect(backend.callCount()).toBe(2);
    });

    it('applies state returned by onMessage', async () => {
      const backend = new FakeSessionBackend({
        onMessage: (session, text) => ({ text: `re:${text}`, state: { ...session.state, last: text } })
      });
      backend.seed('s-1', 'agent', { turn: 0 });

      await backend.sendMessage({ sessionId: 's-1', text: 'hello' });
      const summary = await backend.getSession('s-1');

      expect(summary.state).toEqual({ turn: 0, last: 'hello' });
    });

    it('raises SessionNotFoundError for unknown ids', async () => {
      const backend = new FakeSessionBackend();

      await expect(backend.deleteSession('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
      await expect(backend.sendMessage({ sessionId: 'missing', text: 'x' })).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('fails matching calls the configured number of times', async () => {
      const backend = new FakeSessionBackend();
      backend.failNext('create', () => new UnreachableError('flaky'), 2);

      await expect(backend.createSession({ agentId: 'a', state: {} })).rejects.toThrow('flaky');
      await expect(backend.createSession({ agentId: 'a', state: {} })).rejects.toThrow('flaky');
      await expect(backend.createSession({ agentId: 'a', state: {} })).resolves.toMatchObject({ state: {} });
      expect(backend.sessionCount).toBe(1);
    });

    it('filters failures with a predicate', async () => {
      const backend = new FakeSessionBackend();
      backend.seed('s-1', 'agent');
      backend.seed('s-2', 'agent');
      backend.fail({ operation: 'message', when: (call) => call.sessionId === 's-2', error: new RemoteError('nope', 500) });

      await expect(backend.sendMessage({ sessionId: 's-1', text: 'a' })).resolves.toEqual({ text: 'ack:a' });
      await expect(backend.sendMessage({ sessionId: 's-2', text: 'a' })).rejects.toThrow('nope');
      await expect(backend.sendMessage({ sessionId: 's-2', text: 'a' })).rejects.toThrow('nope');

      backend.clearFailures();
      await expect(backend.sendMessage({ sessionId: 's-2', text: 'a' })).resolves.toEqual({ text: 'ack:a' });
    });

    it('tracks peak concurrency across overlapping calls', async () => {
      const backend = new FakeSessionBackend({ latencyMs: 20 });

      await Promise.all([
        backend.listSessions(),
        backend.listSessions(),
        backend.listSessions()
      ]);

      expect(backend.peakInFlight).toBe(3);
      expect(backend.inFlight).toBe(0);
    });

    it('rejects a delayed call when its signal aborts', async () => {
      const backend = new FakeSessionBackend({ latencyMs: 1_000 });
      const controller = new AbortController();

      const pending = backend.listSessions({ signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(UnreachableError);
      expect(backend.inFlight).toBe(0);
    });
  });

  describe('FakeLogger', () => {
    it('merges child bindings into shared entries', () => {
      const logger = new FakeLogger();
      const child = logger.child({ component: 'pool' });

      logger.info('root message');
      child.warn({ slot: 2 }, 'slot failed');

      expect(logger.logs).toEqual([
        { level: 'info', obj: {}, msg: 'root message' },
        { level: 'warn', obj: { component: 'pool', slot: 2 }, msg: 'slot failed' }
      ]);
      expect(logger.entries('warn')).toHaveLength(1);
    });
  });

  describe('FakeTelemetrySink', () => {
    it('records emitted events', () => {
      const sink = new FakeTelemetrySink();
      const timestamp = new Date('2026-01-01T00:00:00Z');

      sink.emit({ operation: 'create', durationMs: 4, result: 'ok', timestamp });

      expect(sink.events).toEqual([{ operation: 'create', durationMs: 4, result: 'ok', timestamp }]);
    });
  });
});
