import type { LogEntry, Logger, LogLevel, LogListener, LogMeta } from '../types/index.js';
import { ConfigService } from '../services/config.service.js';

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string): value is LogLevel => {
  return LEVELS.some((level) => level === value);
};

class ConsoleLogger implements Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly meta: LogMeta = {},
    private readonly listeners: LogListener[] = [],
  ) {}

  child(meta: LogMeta): Logger {
    return new ConsoleLogger(this.minLevel, { ...this.meta, ...meta }, this.listeners);
  }

  addListener(listener: LogListener): void {
    this.listeners.push(listener);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.minLevel)) {
      return;
    }

    const entry: LogEntry = { level, msg: message, time: Date.now(), meta: { ...this.meta, ...meta } };
    this.listeners.forEach((listener) => listener(entry));

    const consoleTarget =
      level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    consoleTarget(
      `[${level.toUpperCase()}] ${message}`,
      Object.keys(entry.meta).length ? entry.meta : '',
    );
  }
}

/** Console logger honouring `LOG_LEVEL` (default `info`) unless a level is given. */
export function createConsoleLogger(level?: LogLevel): Logger {
  const configured = ConfigService.env('LOG_LEVEL', 'info').toLowerCase();
  return new ConsoleLogger(level ?? (isLogLevel(configured) ? configured : 'info'));
}
