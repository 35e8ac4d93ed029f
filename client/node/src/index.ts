/**
 * @runtime-api/client-node
 *
 * Node side of the runtime API client: logger, configuration and failure
 * classification.
 */

// Config
export {
  loadConfig,
  defaultRuntimeClientConfig,
  type RuntimeClientConfig,
} from "./config.js";

// Logger
export {
  createNodeJSLogger,
  LOG_LEVELS,
  type LogLevel,
  type NodeLoggerOptions,
} from "./logger.js";

// Classification
export {
  classifyStatus,
  classifyTransportError,
  isRetryableStatus,
  TRANSIENT_ERROR_CODES,
} from "./classify.js";

// Re-export core types for convenience
export {
  ApiError,
  ApiErrorKind,
  errorResponseFrom,
  toErrorResponse,
  encodeErrorResponse,
  type ErrorResponse,
  type RuntimeErrorExt,
} from "@runtime-api/core";
