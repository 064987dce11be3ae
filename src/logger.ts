export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Receives each formatted line, newline included. Defaults to stderr. */
  destination?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// bigint has no JSON form; record counts and epoch values are logged as text.
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

function formatExtra(extra: Record<string, unknown>): string {
  return Object.entries(extra)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v, jsonReplacer)}`)
    .join(' ');
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  private emit(line: string): void {
    if (this.options.destination) {
      this.options.destination(line);
      return;
    }
    // stdout stays free for piping.
    process.stderr.write(line);
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(extra ?? {}),
    };

    if ((this.options.format ?? 'text') === 'json') {
      this.emit(`${JSON.stringify(record, jsonReplacer)}\n`);
      return;
    }

    const details = extra && Object.keys(extra).length > 0 ? ` ${formatExtra(extra)}` : '';
    this.emit(`[${record.ts}] ${level.toUpperCase()} ${msg}${details}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

/** Logger that discards everything. */
export const silentLogger = new Logger({ destination: () => {} });
