/**
 * Structured Logger
 *
 * Leveled logging with a fixed context per logger. Outputs JSON lines in
 * production and a readable line elsewhere. The level comes from LOG_LEVEL,
 * defaulting to `info` in production and `debug` otherwise.
 */

import { getRuntimeEnv } from '../env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export interface LogOptions {
  data?: Record<string, unknown>;
  error?: unknown;
}

function minLevel(): LogLevel {
  const env = getRuntimeEnv();
  return env.logLevel ?? (env.isProduction ? 'info' : 'debug');
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel()];
}

export function formatEntry(entry: LogEntry, json: boolean): string {
  if (json) {
    return JSON.stringify(entry);
  }

  const prefix = entry.context ? `[${entry.context}] ` : '';
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const errStr = entry.error ? ` err=${entry.error.message}` : '';
  return `${entry.level.toUpperCase()} ${prefix}${entry.message}${dataStr}${errStr}`;
}

function serializeError(err: unknown): LogEntry['error'] | undefined {
  if (!err) return undefined;
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { message: err.message, stack: err.stack, code };
  }
  if (typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { message: err.message, code };
  }
  return { message: String(err) };
}

function log(level: LogLevel, message: string, context: string, opts?: LogOptions) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    context,
    data: opts?.data,
    error: serializeError(opts?.error),
  };

  const formatted = formatEntry(entry, getRuntimeEnv().isProduction);

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
 * const log = createLogger('TemporalColumns');
 * log.debug('Fell back to datetime layout', { data: { value: '2017-08-01 10:02:57' } });
 */
export function createLogger(context: string) {
  return {
    debug: (message: string, opts?: LogOptions) => log('debug', message, context, opts),
    info: (message: string, opts?: LogOptions) => log('info', message, context, opts),
    warn: (message: string, opts?: LogOptions) => log('warn', message, context, opts),
    error: (message: string, opts?: LogOptions) => log('error', message, context, opts),
  };
}

export type Logger = ReturnType<typeof createLogger>;
