/**
 * Runtime API client errors.
 *
 * Every failure surfaced by the client is classified exactly once, when it is
 * first recognized, as either recoverable (retry the request) or
 * unrecoverable (report a fatal failure and stop the current invocation).
 */

import { Backtrace } from "./backtrace.js";

/** Type tag reported for every ApiError, whatever its kind. */
export const RUNTIME_API_ERROR_TYPE = "RuntimeApiError";

// ── Error kinds ─────────────────────────────────────────────────────

export type ApiErrorKind =
  | { readonly type: "recoverable"; readonly message: string }
  | { readonly type: "unrecoverable"; readonly message: string };

export const ApiErrorKind = {
  /** The request failed but is safe to retry. */
  recoverable(message: string): ApiErrorKind {
    const kind: ApiErrorKind = { type: "recoverable", message };
    return Object.freeze(kind);
  },
  /** The runtime should report a fatal failure and shut down. */
  unrecoverable(message: string): ApiErrorKind {
    const kind: ApiErrorKind = { type: "unrecoverable", message };
    return Object.freeze(kind);
  },
} as const;

function assertNever(value: never): never {
  throw new Error(`Unhandled API error kind: ${JSON.stringify(value)}`);
}

export function formatApiErrorKind(kind: ApiErrorKind): string {
  switch (kind.type) {
    case "recoverable":
      return `Recoverable API error: ${kind.message}`;
    case "unrecoverable":
      return `Unrecoverable API error: ${kind.message}`;
    default:
      return assertNever(kind);
  }
}

// ── Context chain ───────────────────────────────────────────────────

export interface ErrorContextOptions {
  cause?: unknown;
  backtrace?: Backtrace;
}

function hasBacktrace(value: unknown): value is { backtrace(): Backtrace | undefined } {
  return (
    typeof value === "object" &&
    value !== null &&
    "backtrace" in value &&
    typeof value.backtrace === "function"
  );
}

function backtraceOf(cause: unknown): Backtrace | undefined {
  if (hasBacktrace(cause)) return cause.backtrace();
  if (cause instanceof Error) return Backtrace.fromError(cause);
  return undefined;
}

/**
 * A kind plus the error that triggered it and the stack captured for it.
 * The backtrace is the explicit one, else the cause's, else a fresh capture.
 */
export class ErrorContext<K> {
  public readonly kind: K;
  public readonly cause?: unknown;
  private readonly trace?: Backtrace;

  constructor(kind: K, options: ErrorContextOptions = {}) {
    this.kind = kind;
    this.cause = options.cause;
    this.trace = options.backtrace ?? backtraceOf(options.cause) ?? Backtrace.capture();
  }

  backtrace(): Backtrace | undefined {
    return this.trace;
  }
}

// ── ApiError ────────────────────────────────────────────────────────

/**
 * Error returned by the runtime API client.
 */
export class ApiError extends Error {
  private readonly inner: ErrorContext<ApiErrorKind>;

  constructor(source: ApiErrorKind | ErrorContext<ApiErrorKind>) {
    const inner = source instanceof ErrorContext ? source : new ErrorContext(source);
    super(
      formatApiErrorKind(inner.kind),
      inner.cause === undefined ? undefined : { cause: inner.cause }
    );
    this.name = "ApiError";
    this.inner = inner;
  }

  static from(kind: ApiErrorKind): ApiError {
    return new ApiError(kind);
  }

  /** Keeps the cause and backtrace already recorded on the context. */
  static fromContext(context: ErrorContext<ApiErrorKind>): ApiError {
    return new ApiError(context);
  }

  /** Classifies a lower-level failure, keeping it as the cause. */
  static wrap(cause: unknown, kind: ApiErrorKind): ApiError {
    return new ApiError(new ErrorContext(kind, { cause }));
  }

  get kind(): ApiErrorKind {
    return this.inner.kind;
  }

  /** Returns true if the error is recoverable and the request should be retried. */
  isRecoverable(): boolean {
    const kind = this.inner.kind;
    switch (kind.type) {
      case "recoverable":
        return true;
      case "unrecoverable":
        return false;
      default:
        return assertNever(kind);
    }
  }

  backtrace(): Backtrace | undefined {
    return this.inner.backtrace();
  }

  errorType(): string {
    return RUNTIME_API_ERROR_TYPE;
  }
}

export function isApiError(value: unknown): value is ApiError {
  return value instanceof ApiError;
}
