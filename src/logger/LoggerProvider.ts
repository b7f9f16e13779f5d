/**
 * Verbosity for adapter logs. `debug` adds metadata cache activity to the
 * degraded-I/O warnings; `silent` drops both.
 */
export type LogLevel = "debug" | "warn" | "silent";

/**
 * Sink for adapter diagnostics.
 *
 * Operations that swallow an OS or remote failure report it through `warn`
 * with the cause as the first detail.
 */
export interface LoggerProvider {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;

  /**
   * Logger for one adapter. Loggers without it are used unscoped.
   */
  child?(scope: string): LoggerProvider;
}

export function scopeLogger(logger: LoggerProvider, scope: string): LoggerProvider {
  return logger.child ? logger.child(scope) : logger;
}
