/**
 * Logger abstraction.
 *
 * Provides structured, level-based logging with context.
 * A logger is built once per run and handed to each component; there is
 * no module-level handler or level to mutate.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { describeError } from './domain/errors';

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

function formatEntry(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  });
}

/** Default log handler writes structured JSON to console. */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const line = formatEntry(entry);
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

/**
 * Append each entry as one JSON line to `filePath`.
 * The parent directory is created on first use. The first write failure
 * is reported on stderr and turns the handler into a no-op.
 */
export function createFileLogHandler(filePath: string): LogHandler {
  let prepared = false;
  let disabled = false;
  return (entry: LogEntry) => {
    if (disabled) return;
    try {
      if (!prepared) {
        mkdirSync(dirname(filePath), { recursive: true });
        prepared = true;
      }
      appendFileSync(filePath, formatEntry(entry) + '\n', 'utf-8');
    } catch (err) {
      disabled = true;
      console.error(`Log file ${filePath} is not writable, file logging disabled: ${describeError(err)}`);
    }
  };
}

/** Send every entry to each of the given handlers, in order. */
export function fanOutLogHandler(...handlers: LogHandler[]): LogHandler {
  return (entry: LogEntry) => {
    for (const handler of handlers) handler(entry);
  };
}

/** Parse a level name such as "warn" or "DEBUG". Returns undefined for unknown names. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

export interface LoggerOptions {
  handler?: LogHandler;
  /** Messages below this level are suppressed. Defaults to info. */
  minLevel?: LogLevel;
  /** Fields merged into every entry. */
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/** Create a logger with persistent context fields. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const handler = options.handler ?? consoleLogHandler;
  const minLevel = options.minLevel ?? LogLevel.Info;
  const baseContext = options.context ?? {};

  const log = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    handler({
      level,
      message,
      context: { ...baseContext, ...context },
      timestamp: new Date().toISOString(),
    });
  };

  return {
    debug: (msg, ctx) => log(LogLevel.Debug, msg, ctx),
    info: (msg, ctx) => log(LogLevel.Info, msg, ctx),
    warn: (msg, ctx) => log(LogLevel.Warn, msg, ctx),
    error: (msg, ctx) => log(LogLevel.Error, msg, ctx),
    child: (childCtx) => createLogger({ handler, minLevel, context: { ...baseContext, ...childCtx } }),
  };
}

/** A logger that drops every entry. */
export const silentLogger: Logger = createLogger({ handler: () => undefined });
