/**
 * Error response body for the runtime API error and init-failure endpoints.
 *
 * Built from any error exposing a display message, a type tag and, when
 * available, a backtrace. The stack trace is only populated when the
 * backtrace facility collected one.
 */

import { Backtrace } from "./backtrace.js";
import { resolveLogger, type LoggerFactory } from "./logger.js";

const SERVICE_NAME = "runtime-api:error-response";

/** Type tag for errors that do not declare their own. */
export const RUNTIME_ERROR_TYPE = "RuntimeError";

export interface ErrorResponse {
  /** The error message generated by the application. */
  errorMessage: string;
  /** Stable category tag the remote side dispatches on. */
  errorType: string;
  /** One entry per backtrace line, or null when no trace was collected. */
  stackTrace: string[] | null;
}

/**
 * Capability an error needs to be reported to the runtime API.
 */
export interface RuntimeErrorExt {
  readonly message: string;
  errorType(): string;
  backtrace?(): Backtrace | undefined;
}

export interface ErrorResponseOptions {
  loggerFactory?: LoggerFactory;
}

export function isRuntimeErrorExt(value: unknown): value is RuntimeErrorExt {
  return (
    typeof value === "object" &&
    value !== null &&
    "message" in value &&
    typeof value.message === "string" &&
    "errorType" in value &&
    typeof value.errorType === "function"
  );
}

/**
 * String form of a thrown value. Falls back to the Object.prototype tag for
 * values that cannot be converted (null prototype, throwing toString).
 */
export function renderThrown(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

export function toErrorResponse(
  err: RuntimeErrorExt,
  options: ErrorResponseOptions = {}
): ErrorResponse {
  const response: ErrorResponse = {
    errorMessage: err.message,
    errorType: err.errorType(),
    stackTrace: null,
  };

  const backtrace = err.backtrace?.();
  if (backtrace) {
    const log = resolveLogger(options.loggerFactory, SERVICE_NAME);
    log.trace?.({ errorType: response.errorType }, `${SERVICE_NAME}:toErrorResponse - Begin backtrace collection`);
    response.stackTrace = backtrace.toString().split("\n");
    log.trace?.(
      { errorType: response.errorType, lines: response.stackTrace.length },
      `${SERVICE_NAME}:toErrorResponse - Completed backtrace collection`
    );
  }

  return response;
}

/**
 * Builds a response from any thrown value. Values without their own type tag
 * are reported as RUNTIME_ERROR_TYPE.
 */
export function errorResponseFrom(
  value: unknown,
  options: ErrorResponseOptions = {}
): ErrorResponse {
  if (isRuntimeErrorExt(value)) {
    if (value instanceof Error && typeof value.backtrace !== "function") {
      const error = value;
      return toErrorResponse(
        {
          message: error.message,
          errorType: () => error.errorType(),
          backtrace: () => Backtrace.fromError(error),
        },
        options
      );
    }
    return toErrorResponse(value, options);
  }

  if (value instanceof Error) {
    const error = value;
    return toErrorResponse(
      {
        message: error.message,
        errorType: () => RUNTIME_ERROR_TYPE,
        backtrace: () => Backtrace.fromError(error),
      },
      options
    );
  }

  return toErrorResponse(
    { message: renderThrown(value), errorType: () => RUNTIME_ERROR_TYPE },
    options
  );
}
