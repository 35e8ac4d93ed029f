/**
 * Runtime client configuration, read from the environment and an optional
 * dotenv file.
 * Env: RUNTIME_SERVICE_NAME, RUNTIME_LOG_LEVEL, RUNTIME_BACKTRACE.
 */

import { existsSync, readFileSync } from "node:fs";
import { parse as parseDotenv } from "dotenv";
import { z } from "zod";
import { BACKTRACE_ENV_VAR, isBacktraceEnabled, renderThrown, type Logger } from "@runtime-api/core";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

const LOG_PREFIX = "runtime-client:config";

export interface RuntimeClientConfig {
  /** Service name attached to every log line */
  serviceName: string;
  /** Minimum level written by the node logger */
  logLevel: LogLevel;
  /** Whether error responses carry stack traces (RUNTIME_BACKTRACE) */
  backtrace: boolean;
}

export const defaultRuntimeClientConfig = {
  serviceName: "runtime-client",
  logLevel: "info",
  backtrace: false,
} as const satisfies RuntimeClientConfig;

const LogLevelSchema = z.enum(LOG_LEVELS);

const ServiceNameSchema = z.string().trim().min(1);

/**
 * Load config from the environment. When envFile is given it is loaded into
 * env first; variables already set in env take precedence.
 */
export function loadConfig(params: {
  env?: NodeJS.ProcessEnv;
  envFile?: string;
  log?: Logger;
} = {}): RuntimeClientConfig {
  const env = params.env ?? process.env;
  const log: Logger = params.log ?? {};

  if (params.envFile) {
    if (existsSync(params.envFile)) {
      try {
        const parsed = parseDotenv(readFileSync(params.envFile, "utf-8"));
        for (const [key, value] of Object.entries(parsed)) {
          if (env[key] === undefined) env[key] = value;
        }
        log.info?.(
          { envFile: params.envFile, keys: Object.keys(parsed).length },
          `${LOG_PREFIX}:loadConfig - Loaded env file`
        );
      } catch (err) {
        log.error?.(
          { envFile: params.envFile, error: err instanceof Error ? err.message : renderThrown(err) },
          `${LOG_PREFIX}:loadConfig - Failed to load env file`
        );
      }
    } else {
      log.warn?.({ envFile: params.envFile }, `${LOG_PREFIX}:loadConfig - Env file not found`);
    }
  }

  const serviceName = ServiceNameSchema.safeParse(env.RUNTIME_SERVICE_NAME);

  let logLevel: LogLevel = defaultRuntimeClientConfig.logLevel;
  if (env.RUNTIME_LOG_LEVEL !== undefined) {
    const parsed = LogLevelSchema.safeParse(env.RUNTIME_LOG_LEVEL.toLowerCase());
    if (parsed.success) {
      logLevel = parsed.data;
    } else {
      log.warn?.(
        { value: env.RUNTIME_LOG_LEVEL, fallback: logLevel },
        `${LOG_PREFIX}:loadConfig - Invalid RUNTIME_LOG_LEVEL`
      );
    }
  }

  const config: RuntimeClientConfig = {
    serviceName: serviceName.success ? serviceName.data : defaultRuntimeClientConfig.serviceName,
    logLevel,
    backtrace: isBacktraceEnabled(env),
  };

  log.debug?.({ ...config, backtraceVar: BACKTRACE_ENV_VAR }, `${LOG_PREFIX}:loadConfig - Resolved config`);
  return config;
}
