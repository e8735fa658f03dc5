import type { SingletonFactory, SingletonHolderOptions } from "./types.mjs";

import { AsyncSingletonHolder } from "./base-holder.mjs";
import { Mutex } from "./mutex.mjs";

/**
 * Takes the lock on every call, then checks the slot. Correct but every
 * access waits behind any caller currently holding the lock, including
 * after initialisation. Prefer {@link SingletonHolder}.
 */
export class SynchronizedSingletonHolder<T> extends AsyncSingletonHolder<T> {
  private readonly lock = new Mutex();

  constructor(factory: SingletonFactory<T>, options?: SingletonHolderOptions) {
    super(factory, options);
  }

  getInstance(): Promise<T> {
    return this.lock.withLock(async () => {
      this.recordLockAcquisition();
      const slot = this.current();
      if (slot) {
        return slot.value;
      }
      return this.constructAsync(this.factory);
    });
  }
}
