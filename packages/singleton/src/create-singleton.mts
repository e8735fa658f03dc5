import type { AsyncSingletonHolder } from "./base-holder.mjs";
import type {
  SingletonFactory,
  SingletonHolderOptions,
  SingletonStrategy,
} from "./types.mjs";

import { PromiseSingletonHolder } from "./promise-holder.mjs";
import { SingletonHolder } from "./singleton-holder.mjs";
import { SynchronizedSingletonHolder } from "./synchronized-holder.mjs";

export interface CreateSingletonOptions extends SingletonHolderOptions {
  /** Defaults to "double-checked" */
  strategy?: SingletonStrategy;
}

/**
 * Creates an async holder for `factory` using the requested strategy.
 *
 * @example
 * ```ts
 * const cache = createSingleton(() => openCache(), { name: "cache" });
 * const instance = await cache.getInstance();
 * ```
 */
export function createSingleton<T>(
  factory: SingletonFactory<T>,
  { strategy = "double-checked", ...options }: CreateSingletonOptions = {},
): AsyncSingletonHolder<T> {
  switch (strategy) {
    case "double-checked":
      return new SingletonHolder(factory, options);
    case "synchronized":
      return new SynchronizedSingletonHolder(factory, options);
    case "promise":
      return new PromiseSingletonHolder(factory, options);
  }
}
