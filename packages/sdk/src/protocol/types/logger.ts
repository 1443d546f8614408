/**
 * Base structured metadata for log entries.
 * Extend this interface to add application-specific fields.
 *
 * @example
 * ```typescript
 * interface MyAppContext extends BaseLogContext {
 *   tenantId: string;
 * }
 * ```
 */
export interface BaseLogContext {
  /** Client tag sent as the RPC `id` */
  clientTag?: string;
  /** RPC method name */
  method?: string;
  /** Endpoint the request went to */
  endpoint?: string;
  /** HTTP status code */
  statusCode?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Component or module name */
  component?: string;
  /** Directory object type */
  objectType?: string;
  /** DN the operation works on */
  dn?: string;
}

/**
 * Extended log context with index signature for dynamic fields.
 */
export interface LogContext extends BaseLogContext {
  /** Additional typed metadata (escape hatch for dynamic fields) */
  [key: string]: string | number | boolean | string[] | null | undefined;
}

/**
 * Base error context for structured error logging.
 */
export interface BaseErrorContext extends BaseLogContext {
  /** Error kind of the SDK's error taxonomy */
  errorKind?: string;
  /** Error name/type */
  errorName?: string;
}

/**
 * Extended error context with index signature for dynamic fields.
 */
export interface ErrorContext extends BaseErrorContext {
  /** Additional typed metadata (escape hatch for dynamic fields) */
  [key: string]: string | number | boolean | string[] | null | undefined;
}

/**
 * Logger interface for the directory SDK.
 *
 * Implementations can adapt any logging library (Winston, Pino, Bunyan, etc.)
 * to this interface.
 *
 * @example
 * ```typescript
 * const logger: Logger = {
 *   debug: (message, context) => pino.debug(context, message),
 *   info: (message, context) => pino.info(context, message),
 *   warn: (message, context) => pino.warn(context, message),
 *   error: (message, error, context) => pino.error({ err: error, ...context }, message)
 * };
 * ```
 */
export interface Logger<TContext extends BaseLogContext = LogContext, TErrorContext extends BaseErrorContext = ErrorContext> {
  /**
   * Log a debug message.
   * Use for detailed diagnostic information during development.
   */
  debug(message: string, context?: TContext): void;

  /**
   * Log an informational message.
   */
  info(message: string, context?: TContext): void;

  /**
   * Log a warning message.
   */
  warn(message: string, context?: TContext): void;

  /**
   * Log an error message.
   */
  error(message: string, error: Error, context?: TErrorContext): void;
}
