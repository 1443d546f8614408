// =============================================================================
// Logger Implementations
// =============================================================================

import type { ErrorContext, LogContext, Logger } from "./types";

/**
 * No-op logger implementation that discards all log messages.
 * This is the default logger.
 *
 * If you need logging, provide your own Logger implementation via the client options.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  error(_message: string, _error?: Error, _context?: ErrorContext): void {
    // No-op
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.hasOwn(LEVEL_ORDER, value);

export type ConsoleLoggerOptions = {
  /** @default "[directory-rpc]" */
  readonly prefix?: string;

  /**
   * Messages below this level are dropped.
   * @default "debug"
   */
  readonly level?: LogLevel;

  /**
   * Where lines go, e.g. a `Console` on stderr for programs whose stdout is data.
   * @default console
   */
  readonly output?: Pick<Console, LogLevel>;
};

/**
 * Console-based logger implementation.
 * Logs with a prefix and the structured context.
 */
export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly minLevel: number;
  private readonly output: Pick<Console, LogLevel>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? "[directory-rpc]";
    this.minLevel = LEVEL_ORDER[options.level ?? "debug"];
    this.output = options.output ?? console;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.minLevel;
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled("debug")) this.output.debug(`${this.prefix} [DEBUG] ${message}`, context ?? {});
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled("info")) this.output.info(`${this.prefix} [INFO] ${message}`, context ?? {});
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled("warn")) this.output.warn(`${this.prefix} [WARN] ${message}`, context ?? {});
  }

  error(message: string, error: Error, context?: ErrorContext): void {
    if (this.enabled("error")) this.output.error(`${this.prefix} [ERROR] ${message}`, error, context ?? {});
  }
}
