/**
 * Error response wire format.
 *
 * The body is a JSON object with exactly errorMessage, errorType and
 * stackTrace, in that order.
 */

import type { ErrorResponse } from "./error-response.js";
import { ErrorResponseSchema } from "./error-response-schema.js";

const SERVICE_NAME = "runtime-api:wire";

export type WireErrorCode = "INVALID_JSON" | "INVALID_ERROR_RESPONSE";

export class WireDecodeError extends Error {
  public readonly code: WireErrorCode;
  public readonly details?: unknown;

  constructor(args: { code: WireErrorCode; message: string; details?: unknown; cause?: unknown }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "WireDecodeError";
    this.code = args.code;
    this.details = args.details;
  }
}

export function serializeErrorResponse(response: ErrorResponse): string {
  return JSON.stringify({
    errorMessage: response.errorMessage,
    errorType: response.errorType,
    stackTrace: response.stackTrace,
  });
}

export function encodeErrorResponse(response: ErrorResponse): Uint8Array {
  return new TextEncoder().encode(serializeErrorResponse(response));
}

export function decodeErrorResponse(data: Uint8Array | string): ErrorResponse {
  const text = typeof data === "string" ? data : new TextDecoder().decode(data);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new WireDecodeError({
      code: "INVALID_JSON",
      message: `${SERVICE_NAME}:decodeErrorResponse - body is not valid JSON`,
      cause: err,
    });
  }

  const parsed = ErrorResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WireDecodeError({
      code: "INVALID_ERROR_RESPONSE",
      message: `${SERVICE_NAME}:decodeErrorResponse - body does not match the error response shape`,
      details: parsed.error.issues,
    });
  }
  return parsed.data;
}
