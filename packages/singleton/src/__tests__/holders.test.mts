import { describe, expect, it, vi } from "vitest";

import {
  EagerSingletonHolder,
  InitializationError,
  LazySingletonHolder,
  PromiseSingletonHolder,
  SingletonHolder,
  SynchronizedSingletonHolder,
  createSingleton,
} from "../index.mjs";
import { createRecordingLogger, delay } from "./test-utils/helpers.mjs";

const silent = () => createRecordingLogger().logger;

describe("SingletonHolder", () => {
  it("should return the same instance on every call", async () => {
    const factory = vi.fn(async () => ({ id: Math.random() }));
    const holder = new SingletonHolder(factory, { logger: silent() });

    const first = await holder.getInstance();
    const second = await holder.getInstance();

    expect(second).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("should not construct before the first call", async () => {
    const factory = vi.fn(() => "value");
    const holder = new SingletonHolder(factory, { logger: silent() });

    expect(factory).not.toHaveBeenCalled();
    expect(holder.state).toBe("uninitialized");
    expect(holder.isInitialized).toBe(false);
    expect(holder.peek()).toBeUndefined();

    await holder.getInstance();

    expect(holder.state).toBe("initialized");
    expect(holder.isInitialized).toBe(true);
    expect(holder.peek()).toBe("value");
  });

  it("should pass the holder name and attempt to the factory", async () => {
    const factory = vi.fn(() => 1);
    const holder = new SingletonHolder(factory, {
      name: "cache",
      logger: silent(),
    });

    await holder.getInstance();

    expect(factory).toHaveBeenCalledWith({ holder: "cache", attempt: 1 });
  });

  it("should default the name to singleton", () => {
    expect(new SingletonHolder(() => 1, { logger: silent() }).name).toBe(
      "singleton",
    );
  });

  it("should cache an undefined result", async () => {
    const factory = vi.fn(() => undefined);
    const holder = new SingletonHolder(factory, { logger: silent() });

    await holder.getInstance();
    await holder.getInstance();

    expect(factory).toHaveBeenCalledTimes(1);
    expect(holder.isInitialized).toBe(true);
  });

  it("should take the lock only while initialising", async () => {
    const holder = new SingletonHolder(() => ({}), { logger: silent() });

    for (let i = 0; i < 6; i++) {
      await holder.getInstance();
    }

    expect(holder.stats().lockAcquisitions).toBe(1);
  });

  describe("when the factory fails", () => {
    it("should reject with InitializationError and stay uninitialised", async () => {
      const cause = new Error("connection refused");
      const holder = new SingletonHolder(
        () => {
          throw cause;
        },
        { name: "pool", logger: silent() },
      );

      const error: unknown = await holder.getInstance().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InitializationError);
      expect(error).toMatchObject({
        holder: "pool",
        attempt: 1,
        cause,
        message: 'Initialization of "pool" failed on attempt 1: connection refused',
      });
      expect(holder.state).toBe("uninitialized");
      expect(holder.peek()).toBeUndefined();
    });

    it("should retry on the next call", async () => {
      let calls = 0;
      const holder = new SingletonHolder(
        async ({ attempt }) => {
          calls++;
          if (attempt === 1) {
            throw new Error("transient");
          }
          return { attempt };
        },
        { logger: silent() },
      );

      await expect(holder.getInstance()).rejects.toThrow(InitializationError);
      const instance = await holder.getInstance();

      expect(instance).toStrictEqual({ attempt: 2 });
      expect(calls).toBe(2);
      expect(holder.stats()).toStrictEqual({
        attempts: 2,
        failures: 1,
        constructions: 1,
        lockAcquisitions: 2,
      });
    });
  });

  describe("logging", () => {
    it("should log the attempt and the initialisation", async () => {
      const { logger, entries } = createRecordingLogger();
      const holder = new SingletonHolder(() => 1, { name: "cache", logger });

      await holder.getInstance();

      expect(entries).toHaveLength(2);
      expect(entries[0]).toStrictEqual({
        level: "debug",
        message: "constructing instance",
        meta: { holder: "cache", attempt: 1 },
      });
      expect(entries[1]).toMatchObject({
        level: "info",
        message: "instance initialized",
        meta: { holder: "cache", attempt: 1 },
      });
      expect(entries[1]?.meta?.durationMs).toEqual(expect.any(Number));
    });

    it("should log the InitializationError on failure", async () => {
      const { logger, entries } = createRecordingLogger();
      const holder = new SingletonHolder(
        () => {
          throw new Error("boom");
        },
        { name: "cache", logger },
      );

      await holder.getInstance().catch(() => undefined);

      const failure = entries.find((entry) => entry.level === "error");
      expect(failure?.message).toBeInstanceOf(InitializationError);
      expect(failure?.meta).toStrictEqual({ holder: "cache", attempt: 1 });
    });
  });

  describe("tryGetInstance", () => {
    it("should return the instance as a success", async () => {
      const holder = new SingletonHolder(() => "ready", { logger: silent() });

      await expect(holder.tryGetInstance()).resolves.toStrictEqual({
        success: true,
        data: "ready",
      });
    });

    it("should return a retryable operational error on failure", async () => {
      const cause = new Error("timeout");
      let fail = true;
      const holder = new SingletonHolder(
        () => {
          if (fail) {
            throw cause;
          }
          return "ready";
        },
        { name: "pool", logger: silent() },
      );

      const result = await holder.tryGetInstance();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({
          tag: "operational",
          message: 'Initialization of "pool" failed on attempt 1: timeout',
          retryable: true,
          context: { holder: "pool", attempt: 1 },
        });
        expect(result.error.cause).toBe(cause);
      }

      fail = false;
      await expect(holder.tryGetInstance()).resolves.toStrictEqual({
        success: true,
        data: "ready",
      });
    });
  });
});

describe("SynchronizedSingletonHolder", () => {
  it("should take the lock on every call", async () => {
    const factory = vi.fn(() => ({}));
    const holder = new SynchronizedSingletonHolder(factory, { logger: silent() });

    const first = await holder.getInstance();
    for (let i = 0; i < 5; i++) {
      expect(await holder.getInstance()).toBe(first);
    }

    expect(factory).toHaveBeenCalledTimes(1);
    expect(holder.stats().lockAcquisitions).toBe(6);
  });
});

describe("PromiseSingletonHolder", () => {
  it("should hand every concurrent caller the same promise", async () => {
    const holder = new PromiseSingletonHolder(
      async () => {
        await delay(5);
        return {};
      },
      { logger: silent() },
    );

    const first = holder.getInstance();
    const second = holder.getInstance();

    expect(second).toBe(first);
    expect(await second).toBe(await first);
    expect(holder.stats().lockAcquisitions).toBe(0);
  });

  it("should fail every caller of a failing attempt and retry afterwards", async () => {
    let fail = true;
    const holder = new PromiseSingletonHolder(
      async () => {
        await delay(1);
        if (fail) {
          throw new Error("unavailable");
        }
        return "ready";
      },
      { logger: silent() },
    );

    const results = await Promise.allSettled([
      holder.getInstance(),
      holder.getInstance(),
      holder.getInstance(),
    ]);
    expect(results.map((result) => result.status)).toStrictEqual([
      "rejected",
      "rejected",
      "rejected",
    ]);
    expect(holder.stats().attempts).toBe(1);

    fail = false;
    await expect(holder.getInstance()).resolves.toBe("ready");
    expect(holder.stats()).toMatchObject({ attempts: 2, failures: 1 });
  });
});

describe("EagerSingletonHolder", () => {
  it("should construct when the holder is created", () => {
    const factory = vi.fn(() => ({ created: true }));

    const holder = new EagerSingletonHolder(factory, { logger: silent() });

    expect(factory).toHaveBeenCalledTimes(1);
    expect(holder.isInitialized).toBe(true);
    expect(holder.getInstance()).toBe(holder.getInstance());
    expect(holder.peek()).toStrictEqual({ created: true });
  });

  it("should throw InitializationError from its constructor", () => {
    expect(
      () =>
        new EagerSingletonHolder(
          () => {
            throw new Error("bad");
          },
          { name: "eager", logger: silent() },
        ),
    ).toThrow('Initialization of "eager" failed on attempt 1: bad');
  });
});

describe("LazySingletonHolder", () => {
  it("should construct on the first call only", () => {
    const factory = vi.fn(() => ({}));
    const holder = new LazySingletonHolder(factory, { logger: silent() });

    expect(factory).not.toHaveBeenCalled();
    const first = holder.getInstance();

    expect(holder.getInstance()).toBe(first);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("should retry after a failed construction", () => {
    let attempt = 0;
    const holder = new LazySingletonHolder(
      () => {
        attempt++;
        if (attempt === 1) {
          throw new Error("first");
        }
        return attempt;
      },
      { logger: silent() },
    );

    expect(() => holder.getInstance()).toThrow(InitializationError);
    expect(holder.isInitialized).toBe(false);
    expect(holder.getInstance()).toBe(2);
    expect(holder.stats()).toStrictEqual({
      attempts: 2,
      failures: 1,
      constructions: 1,
      lockAcquisitions: 0,
    });
  });
});

describe("createSingleton", () => {
  it("should default to double-checked locking", () => {
    const holder = createSingleton(() => 1, { name: "dcl", logger: silent() });

    expect(holder).toBeInstanceOf(SingletonHolder);
    expect(holder.name).toBe("dcl");
  });

  it.each([
    ["double-checked", SingletonHolder],
    ["synchronized", SynchronizedSingletonHolder],
    ["promise", PromiseSingletonHolder],
  ] as const)("should build a %s holder", async (strategy, expected) => {
    const holder = createSingleton(() => "value", {
      strategy,
      logger: silent(),
    });

    expect(holder).toBeInstanceOf(expected);
    await expect(holder.getInstance()).resolves.toBe("value");
  });
});
