import { describe, expect, it, vi } from "vitest";

import {
  isWorkerLoggerMessage,
  loggerFactory,
  relayWorkerMessage,
  resolveLogLevel,
} from "./index.mjs";

import type { BaseLogger } from "./index.mjs";

const createSink = () => {
  const records: Record<string, unknown>[] = [];
  return {
    records,
    destination: {
      write(chunk: string) {
        const record: Record<string, unknown> = JSON.parse(chunk);
        records.push(record);
      },
    },
  };
};

const createRecordingLogger = (): BaseLogger => ({
  trace: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
});

describe("resolveLogLevel", () => {
  it("should default to info", () => {
    expect(resolveLogLevel({})).toBe("info");
    expect(resolveLogLevel({ LOG_LEVEL: "" })).toBe("info");
  });

  it("should accept known levels case-insensitively", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "DEBUG" })).toBe("debug");
    expect(resolveLogLevel({ LOG_LEVEL: " warn " })).toBe("warn");
    expect(resolveLogLevel({ LOG_LEVEL: "silent" })).toBe("silent");
  });

  it("should fall back to info for unknown levels", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "verbose" })).toBe("info");
  });
});

describe("loggerFactory", () => {
  it("should have all logger methods defined", () => {
    const { logger } = loggerFactory({ level: "silent" });
    expect(logger.trace).toBeDefined();
    expect(logger.debug).toBeDefined();
    expect(logger.info).toBeDefined();
    expect(logger.warn).toBeDefined();
    expect(logger.error).toBeDefined();
    expect(logger.fatal).toBeDefined();
  });

  it("should write a structured line with the message and meta", () => {
    const sink = createSink();
    const { logger } = loggerFactory({
      name: "test",
      level: "info",
      destination: sink.destination,
    });

    logger.info("instance initialized", { holder: "config" });

    expect(sink.records).toHaveLength(1);
    expect(sink.records[0]).toMatchObject({
      level: 30,
      name: "test",
      msg: "instance initialized",
      holder: "config",
    });
  });

  it("should drop messages below the configured level", () => {
    const sink = createSink();
    const { logger } = loggerFactory({
      level: "warn",
      destination: sink.destination,
    });

    logger.debug("constructing");
    logger.info("initialized");
    logger.warn("slow initialization");

    expect(sink.records.map((record) => record.msg)).toStrictEqual([
      "slow initialization",
    ]);
  });

  it("should serialize errors under err", () => {
    const sink = createSink();
    const { logger } = loggerFactory({
      level: "info",
      destination: sink.destination,
    });

    logger.error(new Error("boom"), { attempt: 1 });

    expect(sink.records[0]).toMatchObject({
      level: 50,
      msg: "boom",
      attempt: 1,
      err: { type: "Error", message: "boom" },
    });
  });

  it("should expose the underlying pino logger", () => {
    const { pinoLogger } = loggerFactory({ level: "error" });
    expect(pinoLogger.level).toBe("error");
  });
});

describe("worker message relay", () => {
  it("should recognise posted log messages", () => {
    expect(
      isWorkerLoggerMessage({ type: "message", level: "info", message: "hi" }),
    ).toBe(true);
    expect(
      isWorkerLoggerMessage({
        type: "message",
        level: "error",
        message: new Error("boom"),
        meta: { attempt: 2 },
      }),
    ).toBe(true);
  });

  it("should reject anything else", () => {
    expect(isWorkerLoggerMessage(null)).toBe(false);
    expect(isWorkerLoggerMessage("message")).toBe(false);
    expect(isWorkerLoggerMessage({ type: "result", level: "info", message: "hi" })).toBe(false);
    expect(isWorkerLoggerMessage({ type: "message", level: "silent", message: "hi" })).toBe(false);
    expect(isWorkerLoggerMessage({ type: "message", level: "info", message: 42 })).toBe(false);
  });

  it("should replay a worker message on the given logger", () => {
    const logger = createRecordingLogger();

    const relayed = relayWorkerMessage(logger, {
      type: "message",
      level: "warn",
      message: "from worker",
      meta: { workerId: 3 },
    });

    expect(relayed).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith("from worker", { workerId: 3 });
  });

  it("should ignore values that are not log messages", () => {
    const logger = createRecordingLogger();

    expect(relayWorkerMessage(logger, { type: "done" })).toBe(false);
    expect(logger.info).not.toHaveBeenCalled();
  });
});
