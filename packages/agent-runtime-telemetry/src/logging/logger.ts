/**
 * Pino Logger Factory
 *
 * Structured logging via pino, with typed loggers bound to a module name.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Log level */
  level?: LogLevel;
  /** Enable pretty printing (for development) */
  pretty?: boolean;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Custom transport (for production) */
  transport?: LoggerOptions["transport"];
  /** Explicit destination stream; bypasses transports */
  destination?: DestinationStream;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  for (const level of LOG_LEVELS) {
    if (level === requested) {
      return level;
    }
  }
  return env.NODE_ENV === "test" ? "silent" : "info";
}

function defaultConfig(): LoggerConfig {
  return {
    level: resolveLogLevel(),
    pretty: process.env.NODE_ENV === "development",
    base: {
      service: "agent-warden",
    },
  };
}

/**
 * Create a pino logger instance
 */
export function createLogger(config?: LoggerConfig): Logger {
  const mergedConfig = { ...defaultConfig(), ...config };

  const options: LoggerOptions = {
    level: mergedConfig.level,
    base: mergedConfig.base,
  };

  if (mergedConfig.destination) {
    return pino(options, mergedConfig.destination);
  }

  if (mergedConfig.pretty && !mergedConfig.transport) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  } else if (mergedConfig.transport) {
    options.transport = mergedConfig.transport;
  }

  return pino(options);
}

/**
 * Agent-runtime logger with common methods
 */
export interface RuntimeLogger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: unknown): void;
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

/**
 * Create a runtime logger wrapper
 */
export function createRuntimeLogger(config?: LoggerConfig & { module?: string }): RuntimeLogger {
  const base = createLogger(config);
  const logger = config?.module ? base.child({ module: config.module }) : base;

  return wrapLogger(logger);
}

export function wrapLogger(logger: Logger): RuntimeLogger {
  return {
    trace: (msg, data) => (data ? logger.trace(data, msg) : logger.trace(msg)),
    debug: (msg, data) => (data ? logger.debug(data, msg) : logger.debug(msg)),
    info: (msg, data) => (data ? logger.info(data, msg) : logger.info(msg)),
    warn: (msg, data) => (data ? logger.warn(data, msg) : logger.warn(msg)),
    error: (msg, err) => {
      if (err instanceof Error) {
        logger.error({ err }, msg);
      } else if (err && typeof err === "object") {
        logger.error({ ...err }, msg);
      } else if (err !== undefined) {
        logger.error({ err: String(err) }, msg);
      } else {
        logger.error(msg);
      }
    },
    child: (bindings) => wrapLogger(logger.child(bindings)),
  };
}

export type { Logger } from "pino";

// Root logger shared by every module logger
let rootLogger: Logger | null = null;

/**
 * Replace the root logger (e.g. to route logs into a test destination).
 */
export function configureLogger(config: LoggerConfig): void {
  rootLogger = createLogger(config);
}

/**
 * Get a runtime logger bound to a module name.
 */
export function getLogger(module?: string): RuntimeLogger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return wrapLogger(module ? rootLogger.child({ module }) : rootLogger);
}
