import type { SingletonFactory, SingletonHolderOptions } from "./types.mjs";

import { AsyncSingletonHolder } from "./base-holder.mjs";

/**
 * Lazy-holder idiom: the first caller starts initialisation and every
 * concurrent caller awaits that same promise, so no lock is needed.
 *
 * Unlike {@link SingletonHolder}, callers that joined a failing attempt all
 * receive its `InitializationError`. The promise is dropped on failure, so
 * the next call starts a fresh attempt.
 */
export class PromiseSingletonHolder<T> extends AsyncSingletonHolder<T> {
  private initialization: Promise<T> | null = null;

  constructor(factory: SingletonFactory<T>, options?: SingletonHolderOptions) {
    super(factory, options);
  }

  getInstance(): Promise<T> {
    const slot = this.current();
    if (slot) {
      return Promise.resolve(slot.value);
    }

    // if initialization is in progress, wait for it
    if (this.initialization) {
      return this.initialization;
    }

    const initialization = this.constructAsync(this.factory).catch(
      (error: unknown) => {
        // clear on error so a later call can retry
        this.initialization = null;
        throw error;
      },
    );
    this.initialization = initialization;
    return initialization;
  }
}
