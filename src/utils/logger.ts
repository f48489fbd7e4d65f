export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Prefix naming the component, e.g. `scheduler`. */
  scope?: string;
  /** Defaults to stderr so stdout stays clean for piping. */
  write?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new Logger({ ...this.opts, scope: parent ? `${parent}.${scope}` : scope });
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    const timestamp = new Date().toISOString();
    const scope = this.opts.scope;
    const write = this.opts.write ?? ((line: string) => process.stderr.write(line));

    if (this.opts.json) {
      write(`${JSON.stringify({ timestamp, level, scope, message, data })}\n`);
      return;
    }

    const head = scope ? `${timestamp} ${level} [${scope}] ${message}` : `${timestamp} ${level} ${message}`;
    write(data === undefined ? `${head}\n` : `${head} ${safeJson(data)}\n`);
  }
}

/** Logger that drops everything below `error`; the default for library callers. */
export function quietLogger(): Logger {
  return new Logger({ level: 'error' });
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
