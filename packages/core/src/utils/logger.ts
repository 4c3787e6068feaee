// packages/core/src/utils/logger.ts

import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  /** Logger with the same level and sink, prefixing lines with `[scope]`. */
  child(scope: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Where formatted lines go. Defaults to the console (stderr for warn and error). */
  sink?: LogSink;
  timestamps?: boolean;
  scope?: string;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'warn' || level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function createLogger(level: LogLevel = 'info', options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[level];
  const sink = options.sink ?? consoleSink;
  const timestamps = options.timestamps ?? true;

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const parts: string[] = [];
    if (timestamps) parts.push(`[${new Date().toISOString()}]`);
    parts.push(`${msgLevel.toUpperCase()}:`);
    if (options.scope) parts.push(`[${options.scope}]`);
    parts.push(args.length > 0 ? format(message, ...args) : message);
    sink(msgLevel, parts.join(' '));
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
    child: (scope) =>
      createLogger(level, {
        ...options,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}
