/**
 * Logger interface for runtime API components.
 * Allows optional structured logging with context and message.
 */

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  trace?: LogMethod;
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Type for logger factory: either a Logger or an object with get(name) returning Logger. */
export type LoggerFactory = Logger | { get(name: string): Logger };

/** Fallback used when no logger is supplied: trace and debug entries are dropped. */
export const consoleLogger: Logger = {
  info: (ctx, msg) => console.info(msg, ctx),
  warn: (ctx, msg) => console.warn(msg, ctx),
  error: (ctx, msg) => console.error(msg, ctx),
};

function isFactory(factory: LoggerFactory): factory is { get(name: string): Logger } {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve logger from factory (supports a plain logger or factory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return consoleLogger;
  return isFactory(factory) ? factory.get(serviceName) : factory;
}
