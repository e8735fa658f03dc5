import { isMainThread, parentPort } from "node:worker_threads";
import { pino } from "pino";

import type { DestinationStream, LevelWithSilent, Logger } from "pino";

export type LoggerLevels =
  | "info"
  | "trace"
  | "debug"
  | "warn"
  | "error"
  | "fatal";
export type LogLevel = LevelWithSilent;
export type LoggerMessage = string | Error;
export type LoggerMeta = Record<string, unknown>;

export type BaseLogger = Record<
  LoggerLevels,
  (message: LoggerMessage, meta?: LoggerMeta) => void
>;
export interface WorkerLoggerPostMessageType {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
  type: "message";
}

export interface LoggerFactoryOptions {
  name?: string;
  /** Defaults to {@link resolveLogLevel} */
  level?: LogLevel;
  /** Write to this stream instead of stdout (pretty printing is then ignored) */
  destination?: DestinationStream;
  /** Human readable output through pino-pretty */
  pretty?: boolean;
}

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Reads `LOG_LEVEL`. Unknown or empty values fall back to `info`.
 */
export const resolveLogLevel = (
  env: NodeJS.ProcessEnv = process.env,
): LogLevel => {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
};

const createPinoLogger = (options: LoggerFactoryOptions): Logger => {
  const base = {
    name: options.name,
    level: options.level ?? resolveLogLevel(),
  };

  if (options.destination) {
    return pino(base, options.destination);
  }
  if (options.pretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino(base);
};

/**
 * Plain-string version of a worker message whose payload could not be
 * structured-cloned. Meta is dropped; the clone failure is noted instead.
 */
export const toCloneableMessage = (
  original: WorkerLoggerPostMessageType,
  cloneError: unknown,
): WorkerLoggerPostMessageType => {
  const text =
    original.message instanceof Error
      ? `${original.message.name}: ${original.message.message}`
      : original.message;
  return {
    type: "message",
    level: original.level,
    message: text,
    meta: {
      cloneError:
        cloneError instanceof Error ? cloneError.message : String(cloneError),
    },
  };
};

/**
 * This logger can be used
 * in both the main thread and worker threads.
 */
export const loggerFactory = (options: LoggerFactoryOptions = {}) => {
  const pinoLogger = createPinoLogger(options);

  const logger: BaseLogger & {
    logMessage: (
      level: LoggerLevels,
      message: LoggerMessage,
      meta?: LoggerMeta,
    ) => void;
  } = {
    logMessage(level, message, meta) {
      //If inside a worker thread
      if (!isMainThread) {
        const postMessage: WorkerLoggerPostMessageType = {
          type: "message",
          level,
          message,
          meta,
        };
        try {
          parentPort?.postMessage(postMessage);
        } catch (error) {
          // DataCloneError: message or meta holds something uncloneable
          parentPort?.postMessage(toCloneableMessage(postMessage, error));
        }

        return;
      }
      if (message instanceof Error) {
        pinoLogger[level]({ ...meta, err: message }, message.message);
        return;
      }
      pinoLogger[level](meta ?? {}, message);
    },
    trace: function (message, meta?) {
      this.logMessage("trace", message, meta);
    },
    debug: function (message, meta?) {
      this.logMessage("debug", message, meta);
    },
    info: function (message, meta?) {
      this.logMessage("info", message, meta);
    },
    warn: function (message, meta?) {
      this.logMessage("warn", message, meta);
    },
    error: function (message, meta?) {
      this.logMessage("error", message, meta);
    },
    fatal: function (message, meta?) {
      this.logMessage("fatal", message, meta);
    },
  };

  return { logger, pinoLogger };
};

const WRITABLE_LEVELS: readonly LoggerLevels[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

export const isWorkerLoggerMessage = (
  value: unknown,
): value is WorkerLoggerPostMessageType => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (!("type" in value) || value.type !== "message") {
    return false;
  }
  if (!("level" in value) || !("message" in value)) {
    return false;
  }
  const { level, message } = value;
  return (
    WRITABLE_LEVELS.some((candidate) => candidate === level) &&
    (typeof message === "string" || message instanceof Error)
  );
};

/**
 * Main-thread side of the worker protocol: replays a message posted by a
 * worker's logger. Returns false for anything that is not a log message.
 *
 * @example
 * ```ts
 * worker.on("message", (value) => relayWorkerMessage(logger, value));
 * ```
 */
export const relayWorkerMessage = (
  logger: BaseLogger,
  value: unknown,
): boolean => {
  if (!isWorkerLoggerMessage(value)) {
    return false;
  }
  logger[value.level](value.message, value.meta);
  return true;
};

export default loggerFactory;
