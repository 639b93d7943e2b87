import { LogLevel, Logger } from "../types";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = "info", private readonly prefix = "[aoai-sim]") {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) console.debug(`${this.prefix} ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) console.info(`${this.prefix} ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) console.warn(`${this.prefix} ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) console.error(`${this.prefix} ${message}`, ...args);
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }
}

export class NullLogger implements Logger {
  debug(_message: string, ..._args: unknown[]): void {
    // noop
  }
  info(_message: string, ..._args: unknown[]): void {
    // noop
  }
  warn(_message: string, ..._args: unknown[]): void {
    // noop
  }
  error(_message: string, ..._args: unknown[]): void {
    // noop
  }
}
