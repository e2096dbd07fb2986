import { injectable } from 'inversify';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

/**
 * Writes everything to stderr; stdout is reserved for command output.
 */
@injectable()
export class ConsoleLogger implements ILogger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.DEBUG) console.error(`debug: ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.INFO) console.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.WARN) console.error(`warning: ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.level <= LogLevel.ERROR) console.error(`error: ${message}`, ...args);
  }
}
