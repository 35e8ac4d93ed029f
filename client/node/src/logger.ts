/**
 * Node logger for the runtime client. Writes one JSON line per entry
 * (service + prefix, structured context + message) and drops entries
 * below the configured level.
 */

import type { LogMethod, Logger } from "@runtime-api/core";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface NodeLoggerOptions {
  level?: LogLevel;
  /** Line sink; defaults to console.log, or console.error for the error level. */
  write?: (level: LogLevel, line: string) => void;
}

function defaultWrite(level: LogLevel, line: string): void {
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function render(level: LogLevel, ctx: Record<string, unknown>, msg: string): string {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  try {
    return JSON.stringify({ level, ...payload });
  } catch {
    // Context that does not serialize (cycles, BigInt) is dropped, not the entry.
    return JSON.stringify({ level, msg, service: ctx.service, prefix: ctx.prefix });
  }
}

/**
 * Create a node-style logger factory. Returns an object with get(prefix)
 * that returns a logger with one method per level.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: NodeLoggerOptions = {}
): { get: (prefix: string) => Logger } {
  const minLevel = LOG_LEVELS.indexOf(options.level ?? "info");
  const write = options.write ?? defaultWrite;

  function makeMethod(level: LogLevel, prefix: string): LogMethod | undefined {
    if (LOG_LEVELS.indexOf(level) < minLevel) return undefined;
    return (ctx, msg) => write(level, render(level, { ...ctx, service: serviceName, prefix }, msg));
  }

  return {
    get(prefix: string): Logger {
      return {
        trace: makeMethod("trace", prefix),
        debug: makeMethod("debug", prefix),
        info: makeMethod("info", prefix),
        warn: makeMethod("warn", prefix),
        error: makeMethod("error", prefix),
      };
    },
  };
}
