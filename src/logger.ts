/**
 * Structured logger.
 *
 * Level-based JSON-lines logging with persistent context. Log lines go to
 * stderr so that CLI output on stdout (plans, reports) stays machine-readable.
 * Embedders and tests swap the sink with setLogHandler().
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
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

const stderrHandler: LogHandler = (entry) => {
  const line = JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
  process.stderr.write(line + '\n');
};

let currentHandler: LogHandler = stderrHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

/** Parse a level name from configuration; unknown names yield undefined. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function emit(level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[currentMinLevel]) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => emit(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => emit(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => emit(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => emit(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export const logger = createLogger({ component: 'deckhand' });
