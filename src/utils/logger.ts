export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Fields attached to every line (e.g. `{ jobId }`). */
  bindings?: Record<string, unknown>;
  /** Sink for formatted lines; defaults to stderr. */
  write?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function isLogLevel(v: unknown): v is LogLevel {
  return typeof v === 'string' && (LOG_LEVELS as readonly string[]).includes(v);
}

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.opts.level ?? 'info';
  }

  /** Derive a logger that shares level/format and adds `bindings` to each line. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger({ ...this.opts, bindings: { ...this.opts.bindings, ...bindings } });
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
    if (levelRank[level] < levelRank[this.level]) return;

    const timestamp = new Date().toISOString();
    const bindings = this.opts.bindings;
    const write = this.opts.write ?? ((line: string) => process.stderr.write(line));

    if (this.opts.json) {
      write(`${safeJson({ timestamp, level, message, ...bindings, data })}\n`);
      return;
    }

    const ctx = bindings && Object.keys(bindings).length > 0 ? ` ${formatBindings(bindings)}` : '';
    const line =
      data === undefined
        ? `${timestamp} ${level} ${message}${ctx}`
        : `${timestamp} ${level} ${message}${ctx} ${safeJson(data)}`;
    write(`${line}\n`);
  }
}

function formatBindings(bindings: Record<string, unknown>): string {
  return Object.entries(bindings)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : safeJson(v)}`)
    .join(' ');
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
