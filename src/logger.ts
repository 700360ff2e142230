/**
 * Structured, level-based logging with context.
 *
 * Entries are written as JSON lines to the console by default. Embedders
 * route them elsewhere with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly context: Record<string, unknown>;
  readonly timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

const consoleHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  switch (entry.level) {
    case LogLevel.Error:
      console.error(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

let currentHandler: LogHandler = consoleHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler | null): void {
  currentHandler = handler ?? consoleHandler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value) {
    case 'debug':
      return LogLevel.Debug;
    case 'info':
      return LogLevel.Info;
    case 'warn':
      return LogLevel.Warn;
    case 'error':
      return LogLevel.Error;
    default:
      return undefined;
  }
}

function write(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({ level, message, context, timestamp: new Date().toISOString() });
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => write(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => write(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => write(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => write(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

/** Serializable summary of a thrown value for log context. */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }
  return { error: String(error) };
}

export const logger = createLogger({ component: 'storeward' });
