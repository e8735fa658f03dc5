/**
 * Many simultaneous requests asking for the configuration manager get the
 * same instance, built once.
 *
 *   SERVICE_NAME=orders npm run demo:singleton
 */

import { loggerFactory } from "@creational/logger";

import {
  ConfigurationManager,
  createSingleton,
  isInitializationError,
} from "../src/index.mjs";

const { logger } = loggerFactory({ name: "singleton-demo", pretty: true });

const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

async function main(): Promise<void> {
  const holder = ConfigurationManager.createHolder(
    { ...process.env, SERVICE_NAME: process.env.SERVICE_NAME ?? "demo-service" },
    { logger },
  );

  const managers = await Promise.all(
    Array.from({ length: 10 }, () => holder.getInstance()),
  );
  const [first] = managers;
  logger.info("configuration ready", {
    sameInstance: managers.every((manager) => manager === first),
    serviceName: first?.get("serviceName"),
    stats: holder.stats(),
  });

  // a factory that fails once, then succeeds on retry
  let calls = 0;
  const flaky = createSingleton(
    async ({ attempt }) => {
      calls++;
      await sleep(10);
      if (calls === 1) {
        throw new Error("connection refused");
      }
      return { connectedOn: attempt };
    },
    { name: "flaky-connection", logger },
  );

  const results = await Promise.allSettled(
    Array.from({ length: 5 }, () => flaky.getInstance()),
  );
  for (const result of results) {
    if (result.status === "rejected" && isInitializationError(result.reason)) {
      logger.warn(`caller saw: ${result.reason.message}`);
    }
  }
  logger.info("flaky connection", {
    instance: flaky.peek(),
    stats: flaky.stats(),
  });
}

main().catch((error: unknown) => {
  logger.fatal(error instanceof Error ? error : String(error));
  process.exitCode = 1;
});
