import ora from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// One spinner per running stage. Without a TTY (CI, pipes) each update is a
// static line instead.

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  /** Stop without a status symbol. */
  stop(): void;
}

export function startSpinner(text: string): SpinnerHandle {
  const quiet = process.env.GANTRY_QUIET === '1';
  const verbose = process.env.GANTRY_VERBOSE === '1' && !quiet;
  // Verbose logs go to stderr and would overwrite the spinner line, so spin on stdout then.
  const stream: NodeJS.WriteStream = verbose && process.stdout.isTTY ? process.stdout : process.stderr;

  if (!stream.isTTY || quiet) {
    stream.write(`  ${text}\n`);
    return {
      update: (t) => stream.write(`  ${t}\n`),
      succeed: (t) => {
        if (t) stream.write(`  ✔ ${t}\n`);
      },
      fail: (t) => {
        if (t) stream.write(`  ✖ ${t}\n`);
      },
      stop: () => undefined
    };
  }

  // `ora` turns itself off under CI=1; a TTY is the better signal, so force it on.
  const spinner = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();
  return {
    update: (t) => {
      spinner.text = t;
    },
    succeed: (t) => {
      spinner.succeed(t ?? spinner.text);
    },
    fail: (t) => {
      spinner.fail(t ?? spinner.text);
    },
    stop: () => {
      spinner.stop();
    }
  };
}
