import { describe, expect, it } from 'vitest';

import { CancelledError, TimeoutError, withDeadline } from '../src/utils/timeout.js';

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => signal.addEventListener('abort', () => reject(new Error('stopped')), { once: true }));
}

describe('withDeadline', () => {
  it('returns the work result when it finishes in time', async () => {
    expect(await withDeadline(async () => 'done', { timeoutMs: 1000 })).toBe('done');
  });

  it('times out and aborts the work signal', async () => {
    let inner: AbortSignal | undefined;
    const err = await withDeadline(
      (signal) => {
        inner = signal;
        return never(signal);
      },
      { timeoutMs: 20 }
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(err instanceof TimeoutError && err.timeoutMs).toBe(20);
    expect(inner?.aborted).toBe(true);
  });

  it('waits for work that ignores the abort before rejecting', async () => {
    let finished = false;
    const err = await withDeadline(
      () =>
        new Promise<string>((resolve) =>
          setTimeout(() => {
            finished = true;
            resolve('late');
          }, 100)
        ),
      { timeoutMs: 20 }
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TimeoutError);
    expect(finished).toBe(true);
  });

  it('cancels when the outer signal fires', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);
    await expect(withDeadline(never, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });

  it('refuses to start once already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;
    await expect(
      withDeadline(
        async () => {
          started = true;
          return 1;
        },
        { signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(CancelledError);
    expect(started).toBe(false);
  });

  it('passes work errors through', async () => {
    await expect(withDeadline(async () => Promise.reject(new Error('boom')), { timeoutMs: 1000 })).rejects.toThrow('boom');
  });
});
