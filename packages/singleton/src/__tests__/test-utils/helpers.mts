import type {
  BaseLogger,
  LoggerLevels,
  LoggerMessage,
  LoggerMeta,
} from "@creational/logger";

export interface LogEntry {
  level: LoggerLevels;
  message: LoggerMessage;
  meta?: LoggerMeta;
}

/**
 * Logger that keeps every call in memory
 */
export function createRecordingLogger(): {
  logger: BaseLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const record =
    (level: LoggerLevels) => (message: LoggerMessage, meta?: LoggerMeta) => {
      entries.push({ level, message, meta });
    };

  return {
    entries,
    logger: {
      trace: record("trace"),
      debug: record("debug"),
      info: record("info"),
      warn: record("warn"),
      error: record("error"),
      fatal: record("fatal"),
    },
  };
}

/**
 * Starts every task in its own event loop turn (setImmediate) and waits for
 * all of them, so the calls genuinely interleave.
 */
export function runConcurrently<T>(
  tasks: (() => T | Promise<T>)[],
): Promise<T[]> {
  return Promise.all(
    tasks.map(
      (task) =>
        new Promise<T>((resolve) => {
          setImmediate(() => resolve(task()));
        }),
    ),
  );
}

export const delay = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export const times = <T,>(count: number, fn: (index: number) => T): T[] =>
  Array.from({ length: count }, (_, index) => fn(index));

/**
 * Calls `fn` and returns what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected function to throw");
}
