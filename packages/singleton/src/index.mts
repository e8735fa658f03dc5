/**
 * Lazily initialised, concurrency-safe singletons.
 *
 * @packageDocumentation
 */

export type {
  AsyncSingletonAccessor,
  ConstructionContext,
  SingletonAccessor,
  SingletonFactory,
  SingletonHolderOptions,
  SingletonState,
  SingletonStats,
  SingletonStrategy,
  SyncSingletonFactory,
} from "./types.mjs";

export {
  AsyncSingletonHolder,
  BaseSingletonHolder,
} from "./base-holder.mjs";
export { SingletonHolder } from "./singleton-holder.mjs";
export { SynchronizedSingletonHolder } from "./synchronized-holder.mjs";
export { PromiseSingletonHolder } from "./promise-holder.mjs";
export { EagerSingletonHolder, LazySingletonHolder } from "./sync-holders.mjs";
export {
  createSingleton,
  type CreateSingletonOptions,
} from "./create-singleton.mjs";

export { Mutex, type ReleaseLock } from "./mutex.mjs";
export {
  ConstructionGuard,
  type ConstructionGuardOptions,
  type ConstructionToken,
} from "./construction-guard.mjs";

export {
  IllegalConstructionError,
  InitializationError,
  SingletonError,
  isIllegalConstructionError,
  isInitializationError,
  isSingletonError,
  type IllegalConstructionReason,
  type SingletonErrorTag,
} from "./errors.mjs";

export { ConfigurationManager } from "./configuration-manager.mjs";
export {
  APP_ENVIRONMENTS,
  loadAppConfig,
  type AppConfig,
  type AppEnvironment,
} from "./app-config.mjs";
