// logger.ts
import { LOGGER_PREFIX } from '../config/parserConstants';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(level: LogLevel = 'warn', prefix: string = LOGGER_PREFIX) {
    this.level = level;
    this.prefix = prefix;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, ...args: unknown[]): unknown[] {
    const tag = `[${this.prefix}] [${level.toUpperCase()}]`;
    return [tag, ...args];
  }

  error(...args: unknown[]) {
    if (this.shouldLog('error')) {
      console.error(...this.format('error', ...args));
    }
  }

  warn(...args: unknown[]) {
    if (this.shouldLog('warn')) {
      console.warn(...this.format('warn', ...args));
    }
  }

  info(...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.info(...this.format('info', ...args));
    }
  }

  debug(...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.debug(...this.format('debug', ...args));
    }
  }
}
