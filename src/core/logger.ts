/** Log levels, higher number = more verbose */
export const LogLevel = {
  OFF: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
} as const;
export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.OFF]: 'OFF',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
};

export type LogCategory = 'PARSE' | 'LOADER' | 'STORE' | 'VALIDATE';

/** Destination for formatted lines; swap it out in tests or host apps. */
export interface LogSink {
  error(line: string, ...args: unknown[]): void;
  warn(line: string, ...args: unknown[]): void;
  info(line: string, ...args: unknown[]): void;
  debug(line: string, ...args: unknown[]): void;
}

class LoggerImpl {
  private _level: LogLevel = LogLevel.WARN;
  private _sink: LogSink = console;

  get level(): LogLevel {
    return this._level;
  }

  set level(l: LogLevel) {
    this._level = l;
  }

  setSink(sink: LogSink): void {
    this._sink = sink;
  }

  resetSink(): void {
    this._sink = console;
  }

  error(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.ERROR) return;
    this._sink.error(`[${category}] ${message}`, ...args);
  }

  warn(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.WARN) return;
    this._sink.warn(`[${category}] ${message}`, ...args);
  }

  info(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.INFO) return;
    this._sink.info(`[${category}] ${message}`, ...args);
  }

  debug(category: LogCategory, message: string, ...args: unknown[]): void {
    if (this._level < LogLevel.DEBUG) return;
    this._sink.debug(`[${category}] ${message}`, ...args);
  }
}

/** Shared logger instance, import and use directly */
export const logger = new LoggerImpl();
