import type { LoggerProvider, LogLevel } from "./LoggerProvider.js";

const rank: Record<LogLevel, number> = { debug: 1, warn: 2, silent: 3 };

/**
 * ConsoleLogger: writes to `console.debug` / `console.warn` behind a
 * `[storage]` tag, or `[storage][<adapter>]` once scoped with `child`.
 */
export class ConsoleLogger implements LoggerProvider {
  private readonly prefix: string;

  constructor(
    readonly level: LogLevel = "warn",
    readonly scope?: string
  ) {
    this.prefix = scope ? `[storage][${scope}]` : "[storage]";
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, scope);
  }

  debug(message: string, ...details: unknown[]) {
    if (rank[this.level] <= rank.debug) {
      console.debug(this.prefix, message, ...details);
    }
  }

  warn(message: string, ...details: unknown[]) {
    if (rank[this.level] <= rank.warn) {
      console.warn(this.prefix, message, ...details);
    }
  }
}
