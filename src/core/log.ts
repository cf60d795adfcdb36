export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Which layer wrote a record: the command dispatcher, the scanner, or a query engine. */
export type LogComponent = 'cli' | 'scan' | 'query' | 'graph' | 'analysis';

/** Why a file contributed nothing to a scan or query. */
export type FileSkipReason = 'too_large' | 'binary' | 'unreadable' | 'extract_failed';

export interface LogFields {
  component: LogComponent;
  /** Command key, set by the CLI layer. */
  cmd?: string;
  [key: string]: unknown;
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Threshold from SYMTRAIL_LOG_LEVEL (or LOG_LEVEL); null means logging is off. */
function getConfiguredLevel(env: NodeJS.ProcessEnv): LogLevel | null {
  const raw = String(env.SYMTRAIL_LOG_LEVEL ?? env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (!raw) return 'warn';
  if (raw === 'silent' || raw === 'off' || raw === 'none' || raw === '0') return null;
  if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error') return raw;
  return 'warn';
}

function serializeError(e: unknown): { name?: string; message?: string; code?: string } | undefined {
  if (e === undefined || e === null) return undefined;
  if (e instanceof Error) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    return { name: e.name, message: e.message, code };
  }
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  /** Records at debug level that `path` was left out, and why. */
  skip(path: string, reason: FileSkipReason, fields?: Record<string, unknown>): void;
  child(fields: Partial<LogFields>): Logger;
  span<T>(name: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T>;
}

/**
 * JSON-lines logger on stderr. The threshold is read from the environment
 * when the logger is created. An `err` field is reduced to name, message and
 * errno code; stacks are not logged.
 */
export function createLogger(baseFields: LogFields): Logger {
  const configured = getConfiguredLevel(process.env);
  const threshold = configured ? levelOrder[configured] : Infinity;

  const write = (level: LogLevel, msg: string, fields: Record<string, unknown> = {}) => {
    if (levelOrder[level] < threshold) return;
    const { err, ...rest } = fields;
    const rec = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...baseFields,
      ...rest,
      ...(err === undefined ? {} : { err: serializeError(err) }),
    };
    process.stderr.write(JSON.stringify(rec) + '\n');
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    skip: (path, reason, fields) => write('debug', 'file_skipped', { path, reason, ...fields }),
    child: (fields) => createLogger({ ...baseFields, ...fields }),
    span: async (name, fields, fn) => {
      const startedAt = Date.now();
      try {
        const out = await fn();
        write('info', name, { ...fields, ok: true, duration_ms: Date.now() - startedAt });
        return out;
      } catch (e) {
        write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: e });
        throw e;
      }
    },
  };
}
