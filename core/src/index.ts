// Errors
export * from "./errors.js";

// Backtrace facility
export { Backtrace, BACKTRACE_ENV_VAR, isBacktraceEnabled } from "./backtrace.js";

// Error response (envelope) and its runtime schema
export * from "./error-response.js";
export { ErrorResponseSchema } from "./error-response-schema.js";

// Wire codec
export * from "./wire.js";

// Logger
export * from "./logger.js";
