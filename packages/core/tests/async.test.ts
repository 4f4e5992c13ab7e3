import { describe, expect, it } from 'vitest';

import { TimeoutError, createDeferred, withTimeout } from '../src/index';

describe('async utils', () => {
  it('resolves with the value of a fast call', async () => {
    await expect(withTimeout({ timeoutMs: 100, label: 'fast', run: async () => 42 })).resolves.toBe(42);
  });

  it('rejects a slow call and aborts its signal', async () => {
    let seen: AbortSignal | undefined;
    const slow = withTimeout({
      timeoutMs: 10,
      label: 'create call',
      run: (signal) => {
        seen = signal;
        return new Promise<never>(() => {});
      },
    });

    await expect(slow).rejects.toThrow(new TimeoutError('create call', 10));
    await expect(slow).rejects.toThrow('create call timed out after 10ms');
    expect(seen?.aborted).toBe(true);
  });

  it('settles a deferred from outside', async () => {
    const deferred = createDeferred<string>();
    deferred.resolve('done');
    await expect(deferred.promise).resolves.toBe('done');

    const failed = createDeferred<string>();
    failed.reject(new Error('nope'));
    await expect(failed.promise).rejects.toThrow('nope');
  });
});
