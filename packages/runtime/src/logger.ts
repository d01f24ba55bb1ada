// Structured logging
//
// Every line written while a unit of work runs carries the operation and the
// entity it was called on, so cascade and propagation lines can be traced
// back to the call that caused them.

import { systemClock, type Clock } from './clock.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export type Logger = Record<LogLevel, (message: string, data?: LogFields) => void>;

/**
 * What a lifecycle call was asked to do, and to whom.
 * `subject` is a formatted reference such as `wrestler:w-1`.
 */
export type OperationFields = {
  operation: string;
  subject: string;
};

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function buildLogger(write: (level: LogLevel, message: string, data?: LogFields) => void): Logger {
  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

/**
 * A logger that adds the operation fields to every line. Fields passed with
 * a line win over the bound ones.
 */
export function bindOperation(logger: Logger, fields: OperationFields): Logger {
  return buildLogger((level, message, data) => logger[level](message, { ...fields, ...data }));
}

/**
 * `[INFO] employ wrestler:w-1 Transition committed {"to":"employed"}`
 */
export function formatLogLine(level: LogLevel, message: string, data: LogFields = {}): string {
  const { operation, subject, ...rest } = data;
  const scope =
    typeof operation === 'string' && typeof subject === 'string' ? ` ${operation} ${subject}` : '';
  const extra = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  return `[${level.toUpperCase()}]${scope} ${message}${extra}`;
}

/**
 * Writes one formatted line per entry to the matching console method.
 * Lines below `minLevel` are dropped.
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const threshold = LEVELS.indexOf(minLevel);
  return buildLogger((level, message, data) => {
    if (LEVELS.indexOf(level) < threshold) return;
    console[level](formatLogLine(level, message, data));
  });
}

export const consoleLogger: Logger = createConsoleLogger('info');

/**
 * Silent logger, the default when none is injected
 */
export const silentLogger: Logger = buildLogger(() => {});

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogFields;
  timestamp: string;
};

/**
 * Keep every entry in memory, stamped from `clock`.
 */
export function createCapturingLogger(clock: Clock = systemClock): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    ...buildLogger((level, message, data) => {
      entries.push({ level, message, data, timestamp: clock.now().toISOString() });
    }),
  };
}
