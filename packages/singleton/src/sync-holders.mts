/**
 * Holders for synchronous factories.
 *
 * Synchronous construction cannot interleave with other callers on the
 * event loop, so neither variant needs a lock.
 */

import type { SingletonHolderOptions, SyncSingletonFactory } from "./types.mjs";

import { BaseSingletonHolder } from "./base-holder.mjs";

/**
 * Constructs the instance when the holder itself is created, whether or not
 * it is ever used. A failing factory makes the holder's constructor throw
 * `InitializationError`.
 */
export class EagerSingletonHolder<T> extends BaseSingletonHolder<T> {
  private readonly instance: T;

  constructor(factory: SyncSingletonFactory<T>, options?: SingletonHolderOptions) {
    super(options);
    this.instance = this.constructSync(factory);
  }

  getInstance(): T {
    return this.instance;
  }
}

/**
 * Constructs the instance on the first `getInstance()` call.
 */
export class LazySingletonHolder<T> extends BaseSingletonHolder<T> {
  constructor(
    private readonly factory: SyncSingletonFactory<T>,
    options?: SingletonHolderOptions,
  ) {
    super(options);
  }

  getInstance(): T {
    const slot = this.current();
    if (slot) {
      return slot.value;
    }
    return this.constructSync(this.factory);
  }
}
