export type CancelSignal = 'SIGINT' | 'SIGTERM';
export type CancelSource = 'signal' | 'keypress';

export interface CancelInfo {
  signal: CancelSignal;
  source: CancelSource;
}

export interface InstalledCliCancellation {
  /** Flips on the first Ctrl+C or SIGTERM. */
  signal: AbortSignal;
  /** Cancellation triggers seen so far. */
  count: number;
  /** Remove handlers. */
  dispose(): void;
}

export interface CliCancellationOptions {
  /** First trigger. The session stops at its next suspension point. */
  onCancel?: (info: CancelInfo) => void;
  /** Second trigger. Defaults to exiting with 130 (SIGINT) or 143 (SIGTERM). */
  onForceExit?: (info: CancelInfo & { count: number }) => void;
}

/**
 * Wire Ctrl+C and SIGTERM to an AbortController for the duration of a command.
 * The first press cancels gracefully; the second exits at once.
 */
export function installCliCancellation(opts: CliCancellationOptions = {}): InstalledCliCancellation {
  const controller = new AbortController();
  let count = 0;
  let disposed = false;

  const forceExit =
    opts.onForceExit ??
    ((info: CancelInfo) => {
      process.exit(info.signal === 'SIGTERM' ? 143 : 130);
    });

  const trigger = (info: CancelInfo) => {
    if (disposed) return;
    count += 1;
    if (count === 1) {
      controller.abort(info);
      opts.onCancel?.(info);
      return;
    }
    forceExit({ ...info, count });
  };

  const onSigint = () => trigger({ signal: 'SIGINT', source: 'signal' });
  const onSigterm = () => trigger({ signal: 'SIGTERM', source: 'signal' });

  // `on`, not `once`: a second press forces the exit.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  // In raw-mode TTY input (interactive prompts) Ctrl+C arrives as byte 0x03, not SIGINT.
  const watchStdin = process.stdin.isTTY === true;
  const onStdinData = (chunk: Buffer | string) => {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    if (buf.includes(3)) trigger({ signal: 'SIGINT', source: 'keypress' });
  };
  if (watchStdin) process.stdin.on('data', onStdinData);

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      process.off('SIGINT', onSigint);
      process.off('SIGTERM', onSigterm);
      if (watchStdin) process.stdin.off('data', onStdinData);
    }
  };
}
