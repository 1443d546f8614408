/**
 * Client Errors
 *
 * Every failure surfaced by the SDK is one of five kinds, distinguished by `kind`.
 * The raw server payload, where there is one, travels along in `payload`.
 */

// =============================================================================
// Base Error
// =============================================================================

export type DirectoryRpcErrorKind = "configuration" | "transport" | "authentication" | "directory" | "validation";

export abstract class DirectoryRpcError extends Error {
  abstract readonly kind: DirectoryRpcErrorKind;
  readonly payload?: unknown;

  constructor(message: string, payload?: unknown, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "DirectoryRpcError";
    this.payload = payload;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DirectoryRpcError);
    }
  }
}

// =============================================================================
// Error Kinds
// =============================================================================

/**
 * Invalid construction, e.g. a plaintext endpoint while encryption is enforced.
 */
export class ConfigurationError extends DirectoryRpcError {
  readonly kind = "configuration";

  constructor(message: string, payload?: unknown) {
    super(message, payload);
    this.name = "ConfigurationError";
  }
}

/**
 * Network or HTTP-layer failure: unreachable host, timeout, non-2xx status, unreadable body.
 */
export class TransportError extends DirectoryRpcError {
  readonly kind = "transport";

  constructor(
    message: string,
    payload?: unknown,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, payload, { cause });
    this.name = "TransportError";
  }
}

/**
 * Login rejected, or a session-scoped call made without a session.
 */
export class AuthenticationError extends DirectoryRpcError {
  readonly kind = "authentication";

  constructor(message: string, payload?: unknown, cause?: unknown) {
    super(message, payload, { cause });
    this.name = "AuthenticationError";
  }
}

/**
 * The server reported a failure: a non-null `error`, an `errors` list inside the result,
 * content returned where none was expected, or a result of the wrong shape.
 */
export class DirectoryError extends DirectoryRpcError {
  readonly kind = "directory";

  constructor(
    message: string,
    payload?: unknown,
    public readonly method?: string
  ) {
    super(message, payload);
    this.name = "DirectoryError";
  }
}

/**
 * A caller argument is malformed.
 */
export class ValidationError extends DirectoryRpcError {
  readonly kind = "validation";
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = [], payload?: unknown) {
    super(message, payload);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Validation issue detail.
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export type DirectoryRpcFailure = ConfigurationError | TransportError | AuthenticationError | DirectoryError | ValidationError;

export function isDirectoryRpcError(value: unknown): value is DirectoryRpcFailure {
  return value instanceof DirectoryRpcError;
}

// =============================================================================
// Normalisation
// =============================================================================

/**
 * Converts whatever a catch block received into an Error.
 */
export function toError(err: unknown): Error {
  if (err instanceof Error) {
    return err;
  }

  if (err !== null && typeof err === "object") {
    if ("message" in err) {
      const error = new Error(String(err.message));
      if ("name" in err && typeof err.name === "string") {
        error.name = err.name;
      }
      return error;
    }

    try {
      return new Error(`Non-Error object thrown: ${JSON.stringify(err)}`);
    } catch {
      return new Error("Non-Error object thrown (unable to stringify)");
    }
  }

  return new Error(err === null || err === undefined ? "Null or undefined thrown" : String(err));
}
