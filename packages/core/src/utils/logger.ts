// packages/core/src/utils/logger.ts

import type { LogLevel } from '../types/config.js';

export type { LogLevel };

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
}

export type LogSink = (line: string, ...args: unknown[]) => void;

/**
 * Leveled, timestamped logger. Writes to stderr unless a sink is given, so
 * command output on stdout stays machine-readable.
 */
export function createLogger(level: LogLevel = 'info', sink: LogSink = console.error): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) return;
    const timestamp = new Date().toISOString();
    sink(`[${timestamp}] ${msgLevel.toUpperCase()}: ${message}`, ...args);
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

/** Logger that drops everything; the parser's default. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
