export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends Error {
  constructor(message = 'Cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export interface DeadlineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Run `work` under a timeout and an outer cancellation signal.
 *
 * `work` receives its own signal, aborted on either event, so child processes
 * can be torn down. The returned promise rejects with `TimeoutError` or
 * `CancelledError`, but only once `work` itself has settled: nothing it started
 * may still be writing when the caller moves on.
 */
export async function withDeadline<T>(work: (signal: AbortSignal) => Promise<T>, opts: DeadlineOptions = {}): Promise<T> {
  if (opts.signal?.aborted) throw new CancelledError();

  const controller = new AbortController();
  let fail: (err: Error) => void = () => undefined;
  const interrupted = new Promise<never>((_, reject) => {
    fail = reject;
  });

  // Settle first, then abort: a work promise rejecting on abort must not win the race.
  const onAbort = () => {
    fail(new CancelledError());
    controller.abort();
  };
  opts.signal?.addEventListener('abort', onAbort, { once: true });

  const timeoutMs = opts.timeoutMs;
  const timer =
    timeoutMs && timeoutMs > 0
      ? setTimeout(() => {
          fail(new TimeoutError(timeoutMs));
          controller.abort();
        }, timeoutMs)
      : null;

  const pending = work(controller.signal);
  try {
    return await Promise.race([pending, interrupted]);
  } catch (err) {
    if (controller.signal.aborted) await Promise.allSettled([pending]);
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onAbort);
  }
}
