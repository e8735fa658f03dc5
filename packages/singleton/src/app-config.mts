import { Result, createValidationError } from "@creational/errors";
import { LOG_LEVELS, isLogLevel } from "@creational/logger";

import type { ValidationError } from "@creational/errors";
import type { LogLevel } from "@creational/logger";

export const APP_ENVIRONMENTS = ["development", "test", "production"] as const;
export type AppEnvironment = (typeof APP_ENVIRONMENTS)[number];

export interface AppConfig {
  readonly serviceName: string;
  readonly environment: AppEnvironment;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly featureFlags: readonly string[];
}

const DEFAULT_PORT = 3000;

const isAppEnvironment = (value: string): value is AppEnvironment =>
  APP_ENVIRONMENTS.some((environment) => environment === value);

const parsePort = (raw: string): number | null => {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  const port = Number(raw);
  return port >= 1 && port <= 65535 ? port : null;
};

const parseFeatureFlags = (raw: string | undefined): string[] => [
  ...new Set(
    (raw ?? "")
      .split(",")
      .map((flag) => flag.trim())
      .filter((flag) => flag.length > 0),
  ),
];

/**
 * Reads the service configuration from environment variables.
 *
 * | Variable | Default | Rule |
 * | --- | --- | --- |
 * | `SERVICE_NAME` | none | required, non-blank |
 * | `NODE_ENV` | `development` | development, test or production |
 * | `PORT` | `3000` | integer in 1..65535 |
 * | `LOG_LEVEL` | `info` | a logger level or `silent` |
 * | `FEATURE_FLAGS` | empty | comma separated |
 *
 * Every invalid variable is reported in `fields`, keyed by variable name.
 */
export function loadAppConfig(
  env: NodeJS.ProcessEnv,
): Result<AppConfig, ValidationError> {
  const fields: Record<string, string[]> = {};

  const serviceName = env.SERVICE_NAME?.trim() ?? "";
  if (!serviceName) {
    fields.SERVICE_NAME = ["is required"];
  }

  const rawEnvironment = env.NODE_ENV?.trim() || "development";
  let environment: AppEnvironment = "development";
  if (isAppEnvironment(rawEnvironment)) {
    environment = rawEnvironment;
  } else {
    fields.NODE_ENV = [`must be one of ${APP_ENVIRONMENTS.join(", ")}`];
  }

  const rawPort = env.PORT?.trim();
  let port = DEFAULT_PORT;
  if (rawPort) {
    const parsed = parsePort(rawPort);
    if (parsed === null) {
      fields.PORT = ["must be an integer between 1 and 65535"];
    } else {
      port = parsed;
    }
  }

  const rawLogLevel = env.LOG_LEVEL?.trim().toLowerCase() || "info";
  let logLevel: LogLevel = "info";
  if (isLogLevel(rawLogLevel)) {
    logLevel = rawLogLevel;
  } else {
    fields.LOG_LEVEL = [`must be one of ${LOG_LEVELS.join(", ")}`];
  }

  if (Object.keys(fields).length > 0) {
    return Result.err(createValidationError("Invalid configuration", fields));
  }

  return Result.ok({
    serviceName,
    environment,
    port,
    logLevel,
    featureFlags: parseFeatureFlags(env.FEATURE_FLAGS),
  });
}
