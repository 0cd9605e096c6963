export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Structured fields of an entry. Entries written by a bridge carry `component: 'portcall'`. */
export type LogMeta = Record<string, unknown>;

/** What listeners receive for every entry a logger accepts. */
export type LogEntry = {
  level: LogLevel;
  msg: string;
  time: number;
  meta: LogMeta;
};

export type LogMethod = (message: string, meta?: LogMeta) => void;
export type LogListener = (entry: LogEntry) => void;

/**
 * Logging surface the bridge writes to. Hosts can pass their own implementation;
 * `child` is called once per bridge to tag its entries.
 */
export interface Logger {
  child(meta: LogMeta): Logger;
  addListener(listener: LogListener): void;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}
