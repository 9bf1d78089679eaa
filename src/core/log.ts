export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface LogRecord extends LogFields {
  ts: string;
  level: LogLevel;
  msg: string;
}

/** Receives one finished record. The default writes JSON lines to stderr. */
export type LogSink = (record: LogRecord) => void;

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** `null` means logging is switched off. Unknown values fall back to info. */
export function parseLogLevel(raw: string | undefined): LogLevel | null {
  const v = String(raw ?? '').trim().toLowerCase();
  if (!v) return 'info';
  if (v === 'silent' || v === 'off' || v === 'none' || v === '0') return null;
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  return 'info';
}

function configuredLevel(): LogLevel | null {
  return parseLogLevel(process.env.REALTY_RAG_LOG_LEVEL ?? process.env.LOG_LEVEL);
}

const stderrSink: LogSink = (record) => {
  process.stderr.write(JSON.stringify(record) + '\n');
};

export function serializeError(e: unknown): { name?: string; message?: string; code?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    return { name: e.name, message: e.message, ...(code ? { code } : {}), stack: e.stack };
  }
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
  /** Runs `fn`, then logs `name` once with `ok` and `duration_ms`. Rethrows failures. */
  span<T>(name: string, fields: LogFields, fn: () => Promise<T>): Promise<T>;
}

export interface LoggerOptions {
  /** Overrides REALTY_RAG_LOG_LEVEL / LOG_LEVEL. */
  level?: LogLevel | null;
  sink?: LogSink;
}

export function createLogger(baseFields: LogFields = {}, options: LoggerOptions = {}): Logger {
  const level = options.level !== undefined ? options.level : configuredLevel();
  const threshold = level ? levelOrder[level] : Infinity;
  const sink = options.sink ?? stderrSink;

  const write = (lvl: LogLevel, msg: string, fields?: LogFields) => {
    if (levelOrder[lvl] < threshold) return;
    sink({ ...baseFields, ...(fields ?? {}), ts: new Date().toISOString(), level: lvl, msg });
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }, { level, sink }),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('info', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
        throw e;
      }
    },
  };
}
