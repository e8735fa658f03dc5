import type { BaseLogger } from "@creational/logger";

export type SingletonState = "uninitialized" | "initialized";

/** Passed to every factory call */
export interface ConstructionContext {
  /** Name of the holder running the factory */
  holder: string;
  /** 1 for the first attempt, incremented after each failure */
  attempt: number;
}

export type SingletonFactory<T> = (
  context: ConstructionContext,
) => T | Promise<T>;

export type SyncSingletonFactory<T> = (context: ConstructionContext) => T;

export interface SingletonHolderOptions {
  /** Used in logs and errors. Defaults to "singleton" */
  name?: string;
  /** Defaults to a shared logger named "singleton" */
  logger?: BaseLogger;
}

export interface SingletonStats {
  /** Factory invocations, successful or not */
  attempts: number;
  failures: number;
  /** 0 before initialisation, 1 after */
  constructions: number;
  /** Times the initialisation lock was taken */
  lockAcquisitions: number;
}

export interface SingletonAccessor<T> {
  readonly name: string;
  readonly state: SingletonState;
  readonly isInitialized: boolean;
  /** The instance if it exists, without constructing it */
  peek(): T | undefined;
  getInstance(): T | Promise<T>;
  stats(): SingletonStats;
}

export interface AsyncSingletonAccessor<T> extends SingletonAccessor<T> {
  getInstance(): Promise<T>;
}

export type SingletonStrategy = "double-checked" | "synchronized" | "promise";
