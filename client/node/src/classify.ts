/**
 * Classification of runtime API failures at the point they are first seen.
 *
 * Status codes follow the runtime API contract: 500 signals a container
 * error the runtime cannot recover from, other 5xx and 429 are transient.
 */

import { ApiError, ApiErrorKind, isApiError, renderThrown } from "@runtime-api/core";

const SERVICE_NAME = "runtime-client:classify";

/** Node socket and undici error codes treated as transient. */
export const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export function isRetryableStatus(status: number): boolean {
  if (status === 429) return true;
  return status > 500 && status < 600;
}

/**
 * Classifies a non-2xx runtime API response. A cause that is already an
 * ApiError is returned unchanged.
 *
 * @throws RangeError when status is a success code
 */
export function classifyStatus(status: number, message: string, cause?: unknown): ApiError {
  if (status >= 200 && status < 300) {
    throw new RangeError(`${SERVICE_NAME}:classifyStatus - ${status} is not a failure status`);
  }
  if (isApiError(cause)) return cause;

  const text = `${message} (status ${status})`;
  const kind = isRetryableStatus(status)
    ? ApiErrorKind.recoverable(text)
    : ApiErrorKind.unrecoverable(text);
  return cause === undefined ? ApiError.from(kind) : ApiError.wrap(cause, kind);
}

function errorCodeOf(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Classifies a failure raised while talking to the runtime API. Errors that
 * are already classified pass through unchanged.
 */
export function classifyTransportError(err: unknown): ApiError {
  if (isApiError(err)) return err;

  const code = errorCodeOf(err) ?? errorCodeOf(err instanceof Error ? err.cause : undefined);
  const detail = err instanceof Error ? err.message : renderThrown(err);

  if (code !== undefined && TRANSIENT_ERROR_CODES.has(code)) {
    return ApiError.wrap(err, ApiErrorKind.recoverable(`${code}: ${detail}`));
  }
  return ApiError.wrap(err, ApiErrorKind.unrecoverable(detail));
}
