/**
 * Tagged console logger
 *
 * Writes `[Tag] message` lines to the console and mirrors every entry into
 * the shared log buffer. Prompt and document contents belong at `debug`.
 */

import { RingLogBuffer, type LogBuffer, type LogEntry, type LogLevel } from './log-buffer';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';
let sharedBuffer: LogBuffer = new RingLogBuffer(500);

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setLogBuffer(buffer: LogBuffer): void {
  sharedBuffer = buffer;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      tag,
      message,
      ...(context ? { context } : {}),
    };
    sharedBuffer.push(entry);

    const line = `[${tag}] ${message}`;
    const args: unknown[] = context ? [line, context] : [line];
    switch (level) {
      case 'error':
        console.error(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'debug':
        console.debug(...args);
        break;
      default:
        console.log(...args);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
