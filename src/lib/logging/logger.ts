/**
 * Structured JSON Logger
 *
 * Leveled logging with a fixed context and an optional cluster name.
 * Outputs JSON in production, human-readable otherwise.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  cluster?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export interface LogOptions {
  cluster?: string;
  data?: Record<string, unknown>;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

function resolveMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[resolveMinLevel()];
}

export function formatEntry(entry: LogEntry, json = process.env.NODE_ENV === 'production'): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const prefix = entry.context ? `[${entry.context}]` : '';
  const cluster = entry.cluster ? ` (cluster:${entry.cluster})` : '';
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const errStr = entry.error ? ` err=${entry.error.message}` : '';
  return `${entry.level.toUpperCase()} ${prefix}${cluster} ${entry.message}${dataStr}${errStr}`;
}

function serializeError(err: unknown): LogEntry['error'] | undefined {
  if (!err) return undefined;
  if (err instanceof Error) {
    return {
      message: err.message,
      stack: err.stack,
      code: 'code' in err && typeof err.code === 'string' ? err.code : undefined,
    };
  }
  return { message: String(err) };
}

function log(level: LogLevel, message: string, opts?: LogOptions & { context?: string }) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context: opts?.context,
    cluster: opts?.cluster,
    data: opts?.data,
    error: serializeError(opts?.error),
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    case 'debug':
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }
}

/**
 * Create a logger with a fixed context prefix.
 *
 * @example
 * const log = createLogger('GkeDriverService');
 * log.info('Cluster create requested', { cluster: 'c1', data: { zone: 'us-central1-a' } });
 */
export function createLogger(context: string) {
  return {
    debug: (message: string, opts?: LogOptions) => log('debug', message, { ...opts, context }),
    info: (message: string, opts?: LogOptions) => log('info', message, { ...opts, context }),
    warn: (message: string, opts?: LogOptions) => log('warn', message, { ...opts, context }),
    error: (message: string, opts?: LogOptions) => log('error', message, { ...opts, context }),
  };
}

export type Logger = ReturnType<typeof createLogger>;
