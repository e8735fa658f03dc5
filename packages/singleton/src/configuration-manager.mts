/**
 * Configuration manager for a backend service.
 *
 * - exactly one instance per holder, created on first request
 * - safe when many requests ask for it at the same time
 * - `new ConfigurationManager(...)` from outside always throws
 *
 * @example
 * ```ts
 * const config = await ConfigurationManager.getInstance();
 * if (config.isFeatureEnabled("beta-checkout")) {
 *   // ...
 * }
 * ```
 */

import { unwrap } from "@creational/errors";

import type { AppConfig } from "./app-config.mjs";
import type { ConstructionToken } from "./construction-guard.mjs";
import type { SingletonHolderOptions } from "./types.mjs";

import { loadAppConfig } from "./app-config.mjs";
import { ConstructionGuard } from "./construction-guard.mjs";
import { SingletonHolder } from "./singleton-holder.mjs";

// one instance per holder; the guard only rejects outsiders
const guard = new ConstructionGuard("ConfigurationManager", {
  limit: Number.POSITIVE_INFINITY,
});

export class ConfigurationManager {
  private readonly config: AppConfig;
  private readonly features: ReadonlySet<string>;

  private constructor(token: ConstructionToken, config: AppConfig) {
    guard.redeem(token);
    this.config = Object.freeze({
      ...config,
      featureFlags: Object.freeze([...config.featureFlags]),
    });
    this.features = new Set(config.featureFlags);
  }

  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key];
  }

  /** Frozen copy of the whole configuration */
  snapshot(): AppConfig {
    return this.config;
  }

  isFeatureEnabled(flag: string): boolean {
    return this.features.has(flag);
  }

  /**
   * Creates a holder that validates `env` on first access. Invalid
   * configuration rejects with `InitializationError` whose cause is a
   * `ResultError` carrying the `ValidationError`; nothing is cached, so
   * fixing the environment and calling again succeeds.
   *
   * Injection and test seam: each holder owns its own instance, so a
   * second holder means a second manager. Application code shares the one
   * process-wide manager through {@link ConfigurationManager.getInstance}.
   */
  static createHolder(
    env: NodeJS.ProcessEnv = process.env,
    options: SingletonHolderOptions = {},
  ): SingletonHolder<ConfigurationManager> {
    return new SingletonHolder(
      () => {
        const config = unwrap(loadAppConfig(env));
        return guard.authorize(
          (token) => new ConfigurationManager(token, config),
        );
      },
      { name: "configuration-manager", ...options },
    );
  }

  /** Process-wide instance backed by `process.env` */
  static getInstance(): Promise<ConfigurationManager> {
    return processHolder.getInstance();
  }
}

const processHolder = ConfigurationManager.createHolder();
