import type { SingletonFactory, SingletonHolderOptions } from "./types.mjs";

import { AsyncSingletonHolder } from "./base-holder.mjs";
import { Mutex } from "./mutex.mjs";

/**
 * Lazily constructs one shared instance using double-checked locking.
 *
 * 1. Read the slot without the lock; return it if present.
 * 2. Otherwise take the initialisation lock.
 * 3. Read the slot again: another caller may have finished construction
 *    while this one waited.
 * 4. If still empty, run the factory and store the result.
 * 5. Release the lock (on every path) and return the instance.
 *
 * A failing factory rejects only the caller that ran it. The slot stays
 * empty, so the next caller in line runs the factory again.
 *
 * @example
 * ```ts
 * const pool = new SingletonHolder(async () => connect(url), { name: "pool" });
 *
 * const [a, b] = await Promise.all([pool.getInstance(), pool.getInstance()]);
 * // a === b, connect() ran once
 * ```
 */
export class SingletonHolder<T> extends AsyncSingletonHolder<T> {
  private readonly initLock = new Mutex();

  constructor(factory: SingletonFactory<T>, options?: SingletonHolderOptions) {
    super(factory, options);
  }

  getInstance(): Promise<T> {
    const fast = this.current();
    if (fast) {
      return Promise.resolve(fast.value);
    }

    return this.initLock.withLock(async () => {
      this.recordLockAcquisition();
      const checked = this.current();
      if (checked) {
        return checked.value;
      }
      return this.constructAsync(this.factory);
    });
  }
}
