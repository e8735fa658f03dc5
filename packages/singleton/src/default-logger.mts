import { loggerFactory } from "@creational/logger";

import type { BaseLogger } from "@creational/logger";

let defaultLogger: BaseLogger | null = null;

/**
 * Logger shared by holders created without one. Built on first use so that
 * `LOG_LEVEL` is read when logging starts, not when the module loads.
 */
export const getDefaultLogger = (): BaseLogger => {
  defaultLogger ??= loggerFactory({ name: "singleton" }).logger;
  return defaultLogger;
};
