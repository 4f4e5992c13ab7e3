import { describe, expect, it } from 'vitest';

import {
  createSessionRequestSchema,
  findNonJsonPath,
  formatIssues,
  isJsonValue,
  isSessionState,
  sendMessageRequestSchema,
} from '../src/index';

describe('JSON value checks', () => {
  it('accepts nested plain JSON', () => {
    expect(isJsonValue({ a: [1, 'two', null, { b: true }] })).toBe(true);
    expect(isJsonValue(Object.create(null))).toBe(true);
  });

  it('points at the first non-JSON value', () => {
    expect(findNonJsonPath('$', { a: [1, undefined] })).toBe('$.a[1]');
    expect(findNonJsonPath('$', { when: new Date(0) })).toBe('$.when');
    expect(findNonJsonPath('$', { n: Number.NaN })).toBe('$.n');
    expect(findNonJsonPath('$', { tags: new Set(['x']) })).toBe('$.tags');
    expect(findNonJsonPath('$', () => 1)).toBe('$');
  });

  it('requires session state to be an object', () => {
    expect(isSessionState({ user_name: 'Ada' })).toBe(true);
    expect(isSessionState([])).toBe(false);
    expect(isSessionState(null)).toBe(false);
    expect(isSessionState('state')).toBe(false);
  });
});

describe('request schemas', () => {
  it('trims the agent id', () => {
    const parsed = createSessionRequestSchema.parse({ agentId: '  agent  ', state: { turn: 1 } });
    expect(parsed).toEqual({ agentId: 'agent', state: { turn: 1 } });
  });

  it('formats every issue with its path', () => {
    const result = createSessionRequestSchema.safeParse({ agentId: ' ', state: { bad: undefined } });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(formatIssues(result.error)).toBe(
      'agentId: agentId must not be empty; state: state must be an object holding only JSON values (string, number, boolean, null, array, plain object)'
    );
  });

  it('accepts an empty message text but not a missing one', () => {
    expect(sendMessageRequestSchema.safeParse({ sessionId: 's-1', text: '' }).success).toBe(true);

    const result = sendMessageRequestSchema.safeParse({ sessionId: 's-1' });
    expect(result.success).toBe(false);
  });
});
