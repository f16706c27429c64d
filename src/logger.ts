/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Every pipeline component
 * receives a Logger (usually a child of the root logger carrying its
 * component name) instead of writing to the console directly.
 * The CLI swaps the default JSON handler for the text handler when attached
 * to a terminal.
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

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes structured JSON to console. */
export const jsonLogHandler: LogHandler = (entry: LogEntry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  switch (entry.level) {
    case LogLevel.Error:
      console.error(JSON.stringify(output));
      break;
    case LogLevel.Warn:
      console.warn(JSON.stringify(output));
      break;
    default:
      console.log(JSON.stringify(output));
  }
};

/**
 * Render an entry as one human-readable line:
 * `[warn] linux-static/mips: Unsupported architecture (component=build)`.
 * `platform` and `arch` context fields become the prefix; the rest trail.
 */
export function formatLogLine(entry: LogEntry): string {
  const { platform, arch, ...rest } = entry.context ?? {};
  const cell =
    typeof platform === 'string'
      ? typeof arch === 'string'
        ? `${platform}/${arch}: `
        : `${platform}: `
      : '';
  const extras = Object.entries(rest)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  const suffix = extras.length > 0 ? ` (${extras.join(', ')})` : '';
  return `[${entry.level}] ${cell}${entry.message}${suffix}`;
}

/** Text handler for interactive terminals. */
export const textLogHandler: LogHandler = (entry: LogEntry) => {
  const line = formatLogLine(entry);
  if (entry.level === LogLevel.Error || entry.level === LogLevel.Warn) {
    console.error(line);
  } else {
    console.log(line);
  }
};

let currentHandler: LogHandler = jsonLogHandler;
let currentMinLevel: LogLevel = LogLevel.Info;

/** Replace the active log handler (e.g., for testing or the CLI's text output). */
export function setLogHandler(handler: LogHandler): void {
  currentHandler = handler;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  currentMinLevel = level;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[currentMinLevel];
}

function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;
  currentHandler({
    level,
    message,
    context,
    timestamp: new Date().toISOString(),
  });
}

/** Create a child logger with persistent context fields. */
export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => log(LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => log(LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => createLogger({ ...baseContext, ...childCtx }),
  };
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Root logger instance. */
export const logger = createLogger({ component: 'crossforge' });
