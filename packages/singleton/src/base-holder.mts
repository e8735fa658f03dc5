/**
 * Shared state and bookkeeping for every holder variant.
 *
 * The instance lives in a frozen slot object rather than a bare field so a
 * factory may legitimately produce `undefined` or `null`. The slot is written
 * once and never cleared.
 *
 * @module base-holder
 * @internal
 */

import {
  createOperationalError,
  messageOf,
  tryCatch,
} from "@creational/errors";

import type { ErrorContext, OperationalError, Result } from "@creational/errors";
import type { BaseLogger } from "@creational/logger";
import type {
  AsyncSingletonAccessor,
  ConstructionContext,
  SingletonAccessor,
  SingletonFactory,
  SingletonHolderOptions,
  SingletonState,
  SingletonStats,
  SyncSingletonFactory,
} from "./types.mjs";

import { getDefaultLogger } from "./default-logger.mjs";
import { InitializationError, isInitializationError } from "./errors.mjs";

interface InstanceSlot<T> {
  readonly value: T;
}

export abstract class BaseSingletonHolder<T> implements SingletonAccessor<T> {
  readonly name: string;
  private readonly customLogger: BaseLogger | undefined;

  private slot: InstanceSlot<T> | null = null;
  private attempts = 0;
  private failures = 0;
  private lockAcquisitions = 0;

  constructor(options: SingletonHolderOptions = {}) {
    this.name = options.name ?? "singleton";
    this.customLogger = options.logger;
  }

  protected get logger(): BaseLogger {
    return this.customLogger ?? getDefaultLogger();
  }

  abstract getInstance(): T | Promise<T>;

  get state(): SingletonState {
    return this.slot ? "initialized" : "uninitialized";
  }

  get isInitialized(): boolean {
    return this.slot !== null;
  }

  peek(): T | undefined {
    return this.slot?.value;
  }

  stats(): SingletonStats {
    return {
      attempts: this.attempts,
      failures: this.failures,
      constructions: this.slot ? 1 : 0,
      lockAcquisitions: this.lockAcquisitions,
    };
  }

  /** Unsynchronized read of the slot */
  protected current(): InstanceSlot<T> | null {
    return this.slot;
  }

  protected recordLockAcquisition(): void {
    this.lockAcquisitions++;
  }

  protected constructSync(factory: SyncSingletonFactory<T>): T {
    const context = this.beginAttempt();
    const startedAt = Date.now();
    let value: T;
    try {
      value = factory(context);
    } catch (error) {
      throw this.failAttempt(context, error);
    }
    return this.publish(value, context, startedAt);
  }

  protected async constructAsync(factory: SingletonFactory<T>): Promise<T> {
    const context = this.beginAttempt();
    const startedAt = Date.now();
    let value: T;
    try {
      value = await factory(context);
    } catch (error) {
      throw this.failAttempt(context, error);
    }
    return this.publish(value, context, startedAt);
  }

  private beginAttempt(): ConstructionContext {
    this.attempts++;
    const context: ConstructionContext = {
      holder: this.name,
      attempt: this.attempts,
    };
    this.logger.debug("constructing instance", { ...context });
    return context;
  }

  private failAttempt(
    context: ConstructionContext,
    cause: unknown,
  ): InitializationError {
    this.failures++;
    const error = new InitializationError(context.holder, context.attempt, cause);
    this.logger.error(error, { ...context });
    return error;
  }

  private publish(
    value: T,
    context: ConstructionContext,
    startedAt: number,
  ): T {
    this.slot = Object.freeze({ value });
    this.logger.info("instance initialized", {
      ...context,
      durationMs: Date.now() - startedAt,
    });
    return value;
  }
}

/**
 * Base for holders whose factory may be asynchronous.
 */
export abstract class AsyncSingletonHolder<T>
  extends BaseSingletonHolder<T>
  implements AsyncSingletonAccessor<T>
{
  constructor(
    protected readonly factory: SingletonFactory<T>,
    options?: SingletonHolderOptions,
  ) {
    super(options);
  }

  abstract getInstance(): Promise<T>;

  /**
   * Same as {@link getInstance}, with failures returned as a retryable
   * `OperationalError` instead of thrown.
   */
  tryGetInstance(): Promise<Result<T, OperationalError>> {
    return tryCatch(
      () => this.getInstance(),
      (error) => {
        const context: ErrorContext = { holder: this.name };
        if (isInitializationError(error)) {
          context.attempt = error.attempt;
          return createOperationalError(
            error.message,
            true,
            context,
            error.cause,
          );
        }
        return createOperationalError(messageOf(error), true, context, error);
      },
    );
  }
}
